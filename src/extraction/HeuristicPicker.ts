import type { ElementLike } from "../dom/ElementLike.js";
import type { Candidate } from "../types.js";
import {
  CANDIDATE_TAGS,
  HEADING_TAGS,
  HEADING_WEIGHT,
  LIST_TAGS,
  MIN_HEURISTIC_SCORE,
  PARAGRAPH_WEIGHT,
} from "../constants.js";
import { hasUnwantedClass, removeUnwantedTags, textLength } from "./noise.js";

export interface HeuristicPickerOptions {
  /** Minimum score the best candidate needs. @default 200 */
  minScore?: number;
}

/**
 * Fallback locator: ranks article/div/main containers by text volume plus paragraph and heading density.
 */
export class HeuristicPicker {
  private readonly options: Required<HeuristicPickerOptions>;

  private static readonly DEFAULT_OPTIONS: Required<HeuristicPickerOptions> = {
    minScore: MIN_HEURISTIC_SCORE,
  };

  constructor(options: HeuristicPickerOptions = {}) {
    this.options = { ...HeuristicPicker.DEFAULT_OPTIONS, ...options };
  }

  /**
   * Picks the most article-like container under `root`, or null when nothing is convincing.
   * Destructive: every unwanted tag is removed from `root` before scoring.
   */
  pick(root: ElementLike): ElementLike | null {
    removeUnwantedTags(root);

    let best: Candidate | null = null;
    for (const candidate of this.candidates(root)) {
      // strict comparison keeps the first of equal scores
      if (!best || candidate.score > best.score) {
        best = candidate;
      }
    }

    if (!best || best.score < this.options.minScore) {
      return null;
    }
    return best.element;
  }

  /**
   * Scored, noise-filtered candidates with a positive score, in document order.
   */
  candidates(root: ElementLike): Candidate[] {
    const candidates: Candidate[] = [];
    for (const element of root.descendants()) {
      if (!CANDIDATE_TAGS.includes(element.tagName) || this.looksLikeNoise(element)) continue;
      const score = this.score(element);
      if (score > 0) {
        candidates.push({ element, score });
      }
    }
    return candidates;
  }

  score(element: ElementLike): number {
    let paragraphs = 0;
    let headings = 0;
    for (const descendant of element.descendants()) {
      if (descendant.tagName === "p") paragraphs++;
      else if (HEADING_TAGS.includes(descendant.tagName)) headings++;
    }
    return textLength(element) + paragraphs * PARAGRAPH_WEIGHT + headings * HEADING_WEIGHT;
  }

  private looksLikeNoise(element: ElementLike): boolean {
    return hasUnwantedClass(element) || LIST_TAGS.includes(element.tagName);
  }
}
