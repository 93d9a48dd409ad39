import { DOMAIN_SPECIFIC_SELECTORS, GENERIC_SELECTORS } from "../constants.js";
import { parseSelector } from "./selectors.js";

/**
 * Anything that can list the selectors to try for a domain, most specific first.
 */
export interface SelectorSource {
  selectorsFor(domain: string): string[];
}

export type DomainSelectors = ReadonlyArray<readonly [suffix: string, selectors: ReadonlyArray<string>]>;

/**
 * Maps domain suffixes to known content containers, with a generic list tried for every domain.
 */
export class SelectorRegistry implements SelectorSource {
  private readonly domainSelectors: DomainSelectors;
  private readonly genericSelectors: ReadonlyArray<string>;

  /**
   * @throws {TypeError} If any selector string cannot be parsed.
   */
  constructor(
    domainSelectors: DomainSelectors = DOMAIN_SPECIFIC_SELECTORS,
    genericSelectors: ReadonlyArray<string> = GENERIC_SELECTORS
  ) {
    for (const [, selectors] of domainSelectors) {
      selectors.forEach((selector) => parseSelector(selector));
    }
    genericSelectors.forEach((selector) => parseSelector(selector));
    this.domainSelectors = domainSelectors;
    this.genericSelectors = genericSelectors;
  }

  /**
   * Selectors of every suffix the domain ends with (registration order), then the generic ones.
   * @param domain Lower-cased host, possibly empty.
   */
  selectorsFor(domain: string): string[] {
    const selectors: string[] = [];
    for (const [suffix, items] of this.domainSelectors) {
      if (domain.endsWith(suffix)) {
        selectors.push(...items);
      }
    }
    selectors.push(...this.genericSelectors);
    return selectors;
  }
}
