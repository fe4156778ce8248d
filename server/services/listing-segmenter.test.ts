import { describe, expect, it } from 'vitest';
import { contentHashIdentity } from './listing-identity';
import { createBlock, pageToText, segmentListings, MAX_BLOCK_LENGTH, MIN_BLOCK_LENGTH } from './listing-segmenter';
import { LOCAL_PHONE_PATTERN } from './scraper-utils';

const DATE = '2025-03-09';

const UBI_AD = 'UBI TECHPARK 3/STY B1 Park 4cars. 7858 sf $3.55M Ground flr. Price to sell. 98183835 Jean Lee';
const ALJUNIED_AD = 'Office for rent opp Aljunied MRT, 1200sf. Call 91234567';

const TWO_ADS =
  `Commercial/Industrial Properties Factory Space - 1 ${UBI_AD} ` +
  `Commercial/Industrial Properties Office Space - 2 ${ALJUNIED_AD}`;

describe('pageToText', () => {
  it('prefers the list container and separates block elements with newlines', () => {
    const html = '<html><body><script>var x = 1;</script><div class="listView"><p>First ad</p><p>Second<br>line</p></div><div>outside</div></body></html>';
    expect(pageToText(html)).toBe('First ad\nSecond\nline\n');
  });

  it('falls back to the whole body', () => {
    const html = '<html><body><div>Ad one 91234567</div></body></html>';
    expect(pageToText(html)).toBe('Ad one 91234567\n');
  });
});

describe('segmentListings', () => {
  it('cuts one block per category header', () => {
    const blocks = segmentListings(TWO_ADS, DATE);

    expect(blocks).toHaveLength(2);
    expect(blocks[0]).toEqual({
      id: contentHashIdentity.blockId(UBI_AD, DATE),
      raw_text: UBI_AD,
      category: 'Commercial/Industrial Properties - Factory Space - 1',
      scrape_date: DATE,
    });
    expect(blocks[1].raw_text).toBe(ALJUNIED_AD);
    expect(blocks[1].category).toBe('Commercial/Industrial Properties - Office Space - 2');
  });

  it('handles headers on their own lines as produced by pageToText', () => {
    const html =
      '<div class="listView">' +
      '<p>Commercial/ Industrial Properties</p><p>Factory/ Warehouse Space - 3963</p>' +
      `<p>${UBI_AD}</p>` +
      '<p>Commercial/ Industrial Properties</p><p>Office Space - 3964</p>' +
      `<p>${ALJUNIED_AD}</p>` +
      '</div>';

    const blocks = segmentListings(pageToText(html), DATE);

    expect(blocks.map(b => b.raw_text)).toEqual([UBI_AD, ALJUNIED_AD]);
    expect(blocks[0].category).toBe('Commercial/Industrial Properties - Factory/ Warehouse Space - 3963');
  });

  it('is deterministic', () => {
    expect(segmentListings(TWO_ADS, DATE)).toEqual(segmentListings(TWO_ADS, DATE));
  });

  it('falls back to phone windows when no category header is found', () => {
    const text = 'Random header text here. Big warehouse for rent at Tuas, 5000 sqft, call 98765432 now. Footer';

    const blocks = segmentListings(text, DATE);

    expect(blocks).toHaveLength(1);
    expect(blocks[0].raw_text).toBe('. Big warehouse for rent at Tuas, 5000 sqft, call 98765432 now. Footer');
    expect(blocks[0].category).toBeNull();
  });

  it('ignores phone windows without property keywords', () => {
    const text = 'Lost cat answering to Tom. Reward offered, please call 98765432 any time.';
    expect(segmentListings(text, DATE)).toEqual([]);
  });

  it('returns an empty list for empty input', () => {
    expect(segmentListings('', DATE)).toEqual([]);
  });

  it('returns an empty list for property text without headers or 8-digit runs', () => {
    const text = 'Spacious factory for rent at Tuas, 5000 sqft, call 9876 5432 for viewing';
    expect(segmentListings(text, DATE)).toEqual([]);
  });

  it('only emits blocks that are long enough and carry a local phone', () => {
    const text =
      `Commercial/Industrial Properties Factory Space - 1 ${UBI_AD} ` +
      'Commercial/Industrial Properties Shop Space - 2 Shop 81234567 ' +
      'Commercial/Industrial Properties Office Space - 3 Office for rent, call 12345678 after six pm daily';

    const blocks = segmentListings(text, DATE);

    expect(blocks.length).toBeGreaterThan(0);
    expect(blocks[0].raw_text).toBe(UBI_AD);
    for (const block of blocks) {
      expect(block.raw_text.length).toBeGreaterThanOrEqual(MIN_BLOCK_LENGTH);
      expect(block.raw_text).toMatch(LOCAL_PHONE_PATTERN);
    }
  });

  it('gives the same ad different ids on different dates', () => {
    const [a] = segmentListings(TWO_ADS, '2025-03-09');
    const [b] = segmentListings(TWO_ADS, '2025-03-10');
    expect(a.id).not.toBe(b.id);
  });
});

describe('createBlock', () => {
  it('rejects blocks shorter than 30 characters', () => {
    expect(createBlock('Short ad 91234567', null, DATE)).toBeNull();
  });

  it('rejects blocks without a local phone number', () => {
    expect(createBlock('Nice factory, call 12345678 for viewing today', null, DATE)).toBeNull();
  });

  it('truncates long bodies', () => {
    const block = createBlock(`Warehouse 91234567 ${'x'.repeat(600)}`, null, DATE);
    expect(block?.raw_text).toHaveLength(MAX_BLOCK_LENGTH);
  });

  it('collapses whitespace', () => {
    const block = createBlock('  Shop   for\nrent,\tcall 81234567   today  ', null, DATE);
    expect(block?.raw_text).toBe('Shop for rent, call 81234567 today');
  });
});
