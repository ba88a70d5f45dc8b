import { describe, it, expect } from 'vitest';
import { parseListingsHtml, type HtmlParams } from '../html.js';
import { FetchError } from '../../shared/errors.js';

const PAGE = `<!doctype html>
<html><body>
<ul>
  <li class="listing" data-id="101">
    <a href="/flat/101">Sunny   flat
      near park</a>
    <span class="price">950 €</span>
  </li>
  <li class="listing" data-id="102"><a href="https://other.example.org/x">Loft</a></li>
  <li class="listing"><span class="price">1</span></li>
</ul>
</body></html>`;

const OBSERVED = '2024-05-01T10:00:00.000Z';

function params(overrides: Partial<HtmlParams> = {}): HtmlParams {
  return {
    url: 'https://example.com/search?q=flat',
    item_selector: 'li.listing',
    id_attribute: 'data-id',
    link_selector: 'a[href]',
    price_selector: '.price',
    ...overrides,
  };
}

describe('parseListingsHtml', () => {
  it('extracts one listing per item element', () => {
    expect(parseListingsHtml(PAGE, params(), 'flats', OBSERVED)).toEqual([
      {
        source_id: 'flats',
        listing_id: 'id:101',
        url: 'https://example.com/flat/101',
        title: 'Sunny flat near park',
        price: '950 €',
        observed_at: OBSERVED,
      },
      {
        source_id: 'flats',
        listing_id: 'id:102',
        url: 'https://other.example.org/x',
        title: 'Loft',
        price: null,
        observed_at: OBSERVED,
      },
    ]);
  });

  it('derives ids from links without an id attribute', () => {
    const listings = parseListingsHtml(PAGE, params({ id_attribute: undefined }), 'flats', OBSERVED);
    expect(listings.map((l) => l.listing_id)).toEqual([
      'url:https://example.com/flat/101',
      'url:https://other.example.org/x',
    ]);
  });

  it('reads the title from its own selector', () => {
    const listings = parseListingsHtml(PAGE, params({ title_selector: '.price' }), 'flats', OBSERVED);
    expect(listings.map((l) => l.title)).toEqual(['950 €', 'https://other.example.org/x', '1']);
  });

  it('skips an item with an invalid link and keeps the rest', () => {
    const page = `<ul>
      <li class="listing" data-id="1"><a href="http://">Broken</a></li>
      <li class="listing" data-id="2"><a href="/flat/2">Loft</a></li>
    </ul>`;
    expect(parseListingsHtml(page, params(), 'flats', OBSERVED)).toEqual([
      {
        source_id: 'flats',
        listing_id: 'id:2',
        url: 'https://example.com/flat/2',
        title: 'Loft',
        price: null,
        observed_at: OBSERVED,
      },
    ]);
  });

  it('rejects an invalid selector as permanent', () => {
    let caught: unknown;
    try {
      parseListingsHtml(PAGE, params({ item_selector: '[[' }), 'flats', OBSERVED);
    } catch (err) {
      caught = err;
    }
    expect(caught instanceof FetchError && caught.kind).toBe('permanent');
  });
});
