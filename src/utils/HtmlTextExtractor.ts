import { load } from 'cheerio';

export const MAX_TITLE_LENGTH = 200;

export interface IExtractedPage {
  /** Trimmed <title> text, truncated to MAX_TITLE_LENGTH */
  title?: string;
  /** Visible text, tag-separated, whitespace-collapsed and lowercased (not truncated) */
  text: string;
}

/**
 * Pull the title and the visible text out of an HTML document
 * @param html - Raw response body
 */
export function extractPage(html: string): IExtractedPage {
  const $ = load(html);

  const title = $('title').first().text().trim().slice(0, MAX_TITLE_LENGTH);

  $('script, style, noscript, template').remove();
  // Separate adjacent elements so "<p>a</p><p>b</p>" reads "a b"
  $('*').append(' ');

  const text = $.root().text().replace(/\s+/g, ' ').trim().toLowerCase();

  return {
    ...(title && { title }),
    text
  };
}
