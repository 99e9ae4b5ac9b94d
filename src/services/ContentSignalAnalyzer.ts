import heuristics from '../data/heuristics.json';
import type { IContentSignals } from '../models';

/**
 * Ordered phrase and brand tables used to read parking signals from page text
 */
export interface IContentVocabulary {
  /** Phrases counted towards the parked verdict */
  parkedPhrases: readonly string[];
  /** Marketplace brands; the first one found on a thin page is reported */
  salePlatforms: readonly string[];
  /** Phrases that mark a page as for sale wherever they appear */
  strongSalePhrases: readonly string[];
  /** Title words that disable the large-page guard */
  realSiteTitleMarkers: readonly string[];
  /** Title words that mark a nearly empty page as parked */
  placeholderTitleMarkers: readonly string[];
}

export const DEFAULT_CONTENT_VOCABULARY: IContentVocabulary = {
  parkedPhrases: heuristics.parkedPhrases,
  salePlatforms: heuristics.salePlatforms,
  strongSalePhrases: heuristics.strongSalePhrases,
  realSiteTitleMarkers: heuristics.realSiteTitleMarkers,
  placeholderTitleMarkers: heuristics.placeholderTitleMarkers
};

/** Below this many non-whitespace characters a page is "thin" */
export const THIN_PAGE_LENGTH = 2000;
/** Above this many non-whitespace characters a well-titled page is treated as a real site */
export const REAL_SITE_LENGTH = 5000;
/** Below this many non-whitespace characters only the title is left to judge */
export const PLACEHOLDER_LENGTH = 150;

/**
 * Content Signal Analyzer - classifies parked and for-sale pages from their title and text
 * Pure: no network access, same input always gives the same flags
 */
export class ContentSignalAnalyzer {
  constructor(private readonly vocabulary: IContentVocabulary = DEFAULT_CONTENT_VOCABULARY) {}

  /**
   * Analyze a fetched page
   * @param title - Page title, if the page had one
   * @param bodyText - Full lowercase visible text of the page
   * @returns Parked / for-sale flags; for-sale always implies parked
   */
  analyze(title: string | undefined, bodyText: string): IContentSignals {
    const strippedLength = bodyText.replace(/\s/g, '').length;
    const isThinPage = strippedLength < THIN_PAGE_LENGTH;
    const lowerTitle = (title ?? '').toLowerCase();

    // Large pages with an ordinary title are real sites; ads on them must not count
    if (
      strippedLength > REAL_SITE_LENGTH &&
      lowerTitle.length > 0 &&
      !this.containsAny(lowerTitle, this.vocabulary.realSiteTitleMarkers)
    ) {
      return { isParked: false, isForSale: false };
    }

    let isParked = false;
    let isForSale = false;
    let salePlatform: string | undefined;

    const parkedHits = this.vocabulary.parkedPhrases.filter((phrase) => bodyText.includes(phrase)).length;
    if (parkedHits >= 2 || (parkedHits >= 1 && isThinPage)) {
      isParked = true;
    }

    if (isThinPage) {
      salePlatform = this.vocabulary.salePlatforms.find((platform) => bodyText.includes(platform));
      if (salePlatform) {
        isForSale = true;
      }
    }

    if (this.containsAny(bodyText, this.vocabulary.strongSalePhrases)) {
      isForSale = true;
    }

    if (isForSale) {
      isParked = true;
    }

    if (
      strippedLength < PLACEHOLDER_LENGTH &&
      lowerTitle.length > 0 &&
      this.containsAny(lowerTitle, this.vocabulary.placeholderTitleMarkers)
    ) {
      isParked = true;
    }

    return {
      isParked,
      isForSale,
      ...(salePlatform && { salePlatform })
    };
  }

  private containsAny(text: string, needles: readonly string[]): boolean {
    return needles.some((needle) => text.includes(needle));
  }
}

const defaultAnalyzer = new ContentSignalAnalyzer();

/**
 * Analyze page content with the default vocabulary
 */
export function analyzeContent(title: string | undefined, bodyText: string): IContentSignals {
  return defaultAnalyzer.analyze(title, bodyText);
}
