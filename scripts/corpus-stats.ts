#!/usr/bin/env node
/**
 * Print load statistics for a set of Tatoeba files as JSON.
 *
 * Run with: npx tsx scripts/corpus-stats.ts <sentences> [links] [jpn_indices]
 *
 * TATOEBA_LANGUAGES overrides the language filter: a comma-separated list
 * of tags, or "all" for every language. Load progress goes to stderr.
 */

import { CorpusIndex, CorpusError, corpusStats, stderrLogger } from "../src/index.js";

const [sentences, links, annotations] = process.argv.slice(2);

if (!sentences) {
  console.error("Usage: corpus-stats <sentences> [links] [jpn_indices]");
  process.exit(1);
}

const languageSetting = process.env.TATOEBA_LANGUAGES;
const languages =
  languageSetting === undefined
    ? undefined
    : languageSetting === "all"
      ? null
      : languageSetting
          .split(",")
          .map((l) => l.trim())
          .filter(Boolean);

const start = performance.now();

try {
  const corpus = await CorpusIndex.load(
    { sentences, links, annotations },
    { languages, logger: stderrLogger }
  );
  const loadMs = Math.round(performance.now() - start);
  console.log(JSON.stringify({ ...corpusStats(corpus), loadMs }, null, 2));
} catch (err) {
  if (err instanceof CorpusError) {
    console.error(`${err.name}: ${err.message}`);
    process.exitCode = 1;
  } else {
    throw err;
  }
}
