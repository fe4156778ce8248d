import { createHash } from 'crypto';
import { collapseWhitespace } from './scraper-utils';

/**
 * Derives a listing's identity from its content.
 *
 * Known weakness of the content hash: the same ad rescraped on another date
 * gets a new id, and two different ads sharing their first 100 characters on
 * one date collide (the later one wins during merge). Kept behind this
 * interface so the scheme can be swapped without touching the segmenter.
 */
export interface IdentityStrategy {
  blockId(rawText: string, scrapeDate: string): string;
}

export const ID_PREFIX_LENGTH = 100;
export const ID_HEX_LENGTH = 16;

export const contentHashIdentity: IdentityStrategy = {
  blockId(rawText: string, scrapeDate: string): string {
    const source = `${collapseWhitespace(rawText).slice(0, ID_PREFIX_LENGTH)}_${scrapeDate}`;
    return createHash('md5').update(source).digest('hex').slice(0, ID_HEX_LENGTH);
  },
};
