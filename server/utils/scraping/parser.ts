/**
 * HTML Parser Utilities
 *
 * Helper functions for reading schedule markup with Cheerio. Extraction
 * strategies go through these so whitespace and missing nodes are handled
 * the same way everywhere.
 */

import * as cheerio from 'cheerio';
import { hasChildren, isText, type AnyNode, type Element } from 'domhandler';

export class HTMLParser {
  static load(html: string): cheerio.CheerioAPI {
    return cheerio.load(html);
  }

  /**
   * Text content with runs of whitespace collapsed
   */
  static extractText($elem: cheerio.Cheerio<Element>): string {
    return this.cleanText($elem.text());
  }

  /**
   * Text of the first descendant matching any of the selectors, tried in order
   * @returns Cleaned text, or "" when nothing matches
   */
  static firstText($root: cheerio.Cheerio<Element>, selectors: string[]): string {
    for (const selector of selectors) {
      const $found = $root.find(selector).first();
      if (this.hasContent($found)) return this.extractText($found);
    }
    return '';
  }

  /**
   * Text of an element with the descendants matching `exclude` removed.
   * Children are concatenated the way the page renders them, so adjacent
   * spans like <span>Saturday</span><span>Nov 22</span> come out joined.
   */
  static textWithout($elem: cheerio.Cheerio<Element>, exclude: string): string {
    const $copy = $elem.clone();
    $copy.find(exclude).remove();
    return this.extractText($copy);
  }

  /**
   * Text with a space between every text node, for cells where the page
   * separates words with markup alone (<span>vs</span><span>Nevada</span>).
   */
  static spacedText($elem: cheerio.Cheerio<Element>): string {
    const parts: string[] = [];
    const walk = (node: AnyNode): void => {
      if (isText(node)) parts.push(node.data);
      else if (hasChildren(node)) node.children.forEach(walk);
    };
    $elem.toArray().forEach(walk);
    return this.cleanText(parts.join(' '));
  }

  static classList($elem: cheerio.Cheerio<Element>): string[] {
    return ($elem.attr('class') ?? '').split(/\s+/).filter((c) => c.length > 0);
  }

  static hasContent($elem: cheerio.Cheerio<Element>): boolean {
    return $elem.length > 0 && this.extractText($elem).length > 0;
  }

  /**
   * Collapse whitespace (including non-breaking spaces) and trim
   */
  static cleanText(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
  }
}
