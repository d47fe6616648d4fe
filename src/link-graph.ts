/**
 * Translation groups from pairwise sentence links.
 *
 * The Tatoeba links file lists every "A translates B" edge, and in
 * practice lists all of a sentence's edges together. The default greedy
 * strategy relies on that: each edge joins the group of whichever
 * endpoint is already known, and two existing groups are never merged.
 * When the sentence endpoint already belongs to one group and the
 * translation to another, the translation is re-pointed at the sentence's
 * group and stays listed in its old group as well.
 *
 * The union-find strategy computes true connected components for link
 * files without that ordering.
 */

import { parseGroupingStrategy, parseLinkFilterMode } from "./options.js";
import type {
  GroupingStrategy,
  LinkFilterMode,
  SentenceId,
  TranslationGroup,
} from "./types.js";

function rejectMutation(): never {
  throw new TypeError("Translation groups are read-only");
}

/**
 * A Set whose mutators throw, so a group shared by all of its members
 * cannot be changed through any one of them.
 */
function freezeGroup(ids: Iterable<SentenceId>): TranslationGroup {
  const group = new Set(ids);
  for (const method of ["add", "delete", "clear"] as const) {
    Object.defineProperty(group, method, { value: rejectMutation });
  }
  return Object.freeze(group);
}

export interface LinkGraphBuilderOptions {
  /**
   * Only keep links whose endpoints (see `filterMode`) are in this set.
   * No restriction when omitted.
   */
  sentenceIds?: Iterable<SentenceId> | null;
  /** Default "both". */
  filterMode?: LinkFilterMode | string;
  /** Default "greedy". */
  strategy?: GroupingStrategy | string;
}

/**
 * Finished, read-only grouping. Only `LinkGraphBuilder.build` makes one.
 */
export class LinkGraph {
  private assignment: Map<SentenceId, TranslationGroup>;
  private groupList: TranslationGroup[];

  /** @internal The package exports this class as a type only. */
  constructor(
    assignment: Map<SentenceId, TranslationGroup>,
    groupList: TranslationGroup[]
  ) {
    this.assignment = assignment;
    this.groupList = groupList;
  }

  /**
   * The group a sentence belongs to, or undefined if it has no links.
   */
  groupOf(id: SentenceId): TranslationGroup | undefined {
    return this.assignment.get(id);
  }

  has(id: SentenceId): boolean {
    return this.assignment.has(id);
  }

  /**
   * All groups, in the order they were started.
   */
  groups(): TranslationGroup[] {
    return [...this.groupList];
  }

  ids(): IterableIterator<SentenceId> {
    return this.assignment.keys();
  }

  /**
   * Number of sentences with at least one kept link.
   */
  get size(): number {
    return this.assignment.size;
  }
}

export class LinkGraphBuilder {
  readonly filterMode: LinkFilterMode;
  readonly strategy: GroupingStrategy;
  readonly sentenceIdSubset: ReadonlySet<SentenceId> | null;

  private filterSentence: boolean;
  private filterTranslation: boolean;

  // greedy state
  private assignment = new Map<SentenceId, number>();
  private members = new Map<number, Set<SentenceId>>();
  private nextGroupId = 0;

  // union-find state
  private parent = new Map<SentenceId, SentenceId>();
  private rank = new Map<SentenceId, number>();

  constructor(options: LinkGraphBuilderOptions = {}) {
    this.filterMode = parseLinkFilterMode(options.filterMode ?? "both");
    this.strategy = parseGroupingStrategy(options.strategy ?? "greedy");
    this.sentenceIdSubset = options.sentenceIds
      ? new Set(options.sentenceIds)
      : null;

    const screened = this.sentenceIdSubset !== null;
    this.filterSentence = screened && this.filterMode !== "translation_id";
    this.filterTranslation = screened && this.filterMode !== "sentence_id";
  }

  /**
   * Whether an edge passes the sentence id filter.
   */
  accepts(sentenceId: SentenceId, translationId: SentenceId): boolean {
    const subset = this.sentenceIdSubset;
    if (!subset) return true;
    if (this.filterSentence && !subset.has(sentenceId)) return false;
    if (this.filterTranslation && !subset.has(translationId)) return false;
    return true;
  }

  /**
   * Add one link.
   *
   * @returns false if the filter dropped it
   */
  addLink(sentenceId: SentenceId, translationId: SentenceId): boolean {
    if (!this.accepts(sentenceId, translationId)) {
      return false;
    }

    if (this.strategy === "greedy") {
      this.addGreedy(sentenceId, translationId);
    } else {
      this.union(sentenceId, translationId);
    }
    return true;
  }

  /**
   * Freeze the groups. Each member of a group maps to the same set.
   */
  build(): LinkGraph {
    return this.strategy === "greedy" ? this.buildGreedy() : this.buildUnionFind();
  }

  private addGreedy(sentenceId: SentenceId, translationId: SentenceId): void {
    const existing = this.assignment.get(sentenceId);
    if (existing !== undefined) {
      this.attach(existing, translationId);
      return;
    }

    const other = this.assignment.get(translationId);
    if (other !== undefined) {
      this.attach(other, sentenceId);
      return;
    }

    const groupId = this.nextGroupId++;
    this.members.set(groupId, new Set([sentenceId, translationId]));
    this.assignment.set(sentenceId, groupId);
    this.assignment.set(translationId, groupId);
  }

  private attach(groupId: number, id: SentenceId): void {
    this.members.get(groupId)?.add(id);
    this.assignment.set(id, groupId);
  }

  private buildGreedy(): LinkGraph {
    const frozen = new Map<number, TranslationGroup>();
    for (const [groupId, ids] of this.members) {
      frozen.set(groupId, freezeGroup(ids));
    }

    const assignment = new Map<SentenceId, TranslationGroup>();
    for (const [id, groupId] of this.assignment) {
      const group = frozen.get(groupId);
      if (group) assignment.set(id, group);
    }

    return new LinkGraph(assignment, [...frozen.values()]);
  }

  private find(id: SentenceId): SentenceId {
    let root = id;
    let next = this.parent.get(root);
    while (next !== undefined && next !== root) {
      root = next;
      next = this.parent.get(root);
    }

    // Path compression
    let current = id;
    while (current !== root) {
      const up = this.parent.get(current) ?? root;
      this.parent.set(current, root);
      current = up;
    }

    return root;
  }

  private union(a: SentenceId, b: SentenceId): void {
    for (const id of [a, b]) {
      if (!this.parent.has(id)) {
        this.parent.set(id, id);
        this.rank.set(id, 0);
      }
    }

    const rootA = this.find(a);
    const rootB = this.find(b);
    if (rootA === rootB) return;

    const rankA = this.rank.get(rootA) ?? 0;
    const rankB = this.rank.get(rootB) ?? 0;
    if (rankA < rankB) {
      this.parent.set(rootA, rootB);
    } else if (rankA > rankB) {
      this.parent.set(rootB, rootA);
    } else {
      this.parent.set(rootB, rootA);
      this.rank.set(rootA, rankA + 1);
    }
  }

  private buildUnionFind(): LinkGraph {
    // Map iteration follows insertion, so groups come out in order of
    // their first-seen member.
    const byRoot = new Map<SentenceId, Set<SentenceId>>();
    for (const id of this.parent.keys()) {
      const root = this.find(id);
      let ids = byRoot.get(root);
      if (!ids) {
        ids = new Set();
        byRoot.set(root, ids);
      }
      ids.add(id);
    }

    const groupList: TranslationGroup[] = [];
    const assignment = new Map<SentenceId, TranslationGroup>();
    for (const ids of byRoot.values()) {
      const group = freezeGroup(ids);
      groupList.push(group);
      for (const id of ids) assignment.set(id, group);
    }

    return new LinkGraph(assignment, groupList);
  }
}
