import { describe, it, expect, vi } from 'vitest';
import { ConnectionQuota } from '../../connection-quota';
import type { FetchLike } from '../../timeout';
import {
  crawl,
  DEFAULT_DEEP_LINK_POLICY,
  normalizeUrl,
  pageText,
  selectDeepLinks,
} from './crawler';

type Route =
  | { status?: number; body?: string; headers?: Record<string, string> }
  | 'hang'
  | 'network-error';

function fakeFetch(routes: Record<string, Route>) {
  return vi.fn<FetchLike>(async (url, init) => {
    const route = routes[url];
    if (route === undefined) {
      return new Response('not found', { status: 404 });
    }
    if (route === 'network-error') {
      throw new TypeError('fetch failed');
    }
    if (route === 'hang') {
      return new Promise<Response>((_, reject) => {
        init?.signal?.addEventListener('abort', () => {
          reject(Object.assign(new Error('This operation was aborted'), { name: 'AbortError' }));
        });
      });
    }
    return new Response(route.body ?? '', {
      status: route.status ?? 200,
      headers: { 'content-type': 'text/html; charset=utf-8', ...route.headers },
    });
  });
}

const studioHome = `
  <html><body>
    <h1>Jane Studio</h1>
    <a href="/contact">Get in touch</a>
    <a href="/shop">Shop</a>
    <a href="/about-me">Me</a>
    <a href="https://other-site.io/contact">Friends</a>
    <a href="https://instagram.com/jane">IG</a>
    <a href="mailto:jane@studio.io">Mail</a>
  </body></html>`;

describe('crawl', () => {
  it('should fetch the seed and one hop of contact-like same-site links', async () => {
    const fetchImpl = fakeFetch({
      'https://jane.studio/': { body: studioHome },
      'https://jane.studio/contact': { body: '<p>bookings@jane.studio</p>' },
      'https://jane.studio/about-me': { body: '<p>About</p>' },
    });

    const report = await crawl(['https://jane.studio'], { fetchImpl, maxDepth: 1 });

    expect(report.pages.map(p => [p.url, p.depth])).toEqual([
      ['https://jane.studio/', 0],
      ['https://jane.studio/contact', 1],
      ['https://jane.studio/about-me', 1],
    ]);
    expect(report.failures).toEqual([]);
    expect(fetchImpl).toHaveBeenCalledTimes(3);
  });

  it('should not follow links at max depth 0', async () => {
    const fetchImpl = fakeFetch({ 'https://jane.studio/': { body: studioHome } });

    const report = await crawl(['https://jane.studio/'], { fetchImpl, maxDepth: 0 });

    expect(report.pages.map(p => p.url)).toEqual(['https://jane.studio/']);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('should follow outbound links from a link-in-bio page', async () => {
    const fetchImpl = fakeFetch({
      'https://linktr.ee/jane': {
        body: `
          <a href="https://jane.studio/">My site</a>
          <a href="https://www.instagram.com/jane">Instagram</a>
          <a href="https://beacons.ai/jane">Beacons</a>
          <a href="https://linktr.ee/help">Help</a>
          <a href="https://podcast.fm/show">Podcast</a>`,
      },
      'https://jane.studio/': { body: '<p>Home</p>' },
      'https://podcast.fm/show': { body: '<p>Show</p>' },
    });

    const report = await crawl(['https://linktr.ee/jane'], { fetchImpl });

    expect(report.pages.map(p => [p.url, p.depth])).toEqual([
      ['https://linktr.ee/jane', 0],
      ['https://jane.studio/', 1],
      ['https://podcast.fm/show', 1],
    ]);
  });

  it('should stop at the page ceiling', async () => {
    const fetchImpl = fakeFetch({
      'https://a.io/': { body: '<p>a</p>' },
      'https://b.io/': { body: '<p>b</p>' },
      'https://c.io/': { body: '<p>c</p>' },
    });

    const report = await crawl(['https://a.io/', 'https://b.io/', 'https://c.io/'], { fetchImpl, maxPages: 2 });

    expect(report.pages.map(p => p.url)).toEqual(['https://a.io/', 'https://b.io/']);
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  it('should return no pages and no error when the seed times out', async () => {
    const fetchImpl = fakeFetch({ 'https://slow.io/': 'hang' });

    const report = await crawl(['https://slow.io/'], { fetchImpl, maxDepth: 1, timeoutMs: 20 });

    expect(report.pages).toEqual([]);
    expect(report.failures).toEqual([
      { url: 'https://slow.io/', depth: 0, reason: 'timeout', detail: '20ms' },
    ]);
  });

  it('should record failures without aborting sibling seeds', async () => {
    const fetchImpl = fakeFetch({
      'https://down.io/': 'network-error',
      'https://ok.io/': { body: '<p>fine</p>' },
    });

    const report = await crawl(['https://missing.io/', 'https://down.io/', 'https://ok.io/'], { fetchImpl });

    expect(report.pages.map(p => p.url)).toEqual(['https://ok.io/']);
    expect(report.failures).toEqual([
      { url: 'https://missing.io/', depth: 0, reason: 'http_status', detail: '404' },
      { url: 'https://down.io/', depth: 0, reason: 'network_error', detail: 'fetch failed' },
    ]);
  });

  it('should never retry a failed page', async () => {
    const fetchImpl = fakeFetch({ 'https://flaky.io/': { status: 503 } });

    await crawl(['https://flaky.io/'], { fetchImpl });

    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('should skip oversized and non-text responses', async () => {
    const fetchImpl = fakeFetch({
      'https://big.io/': { body: 'x', headers: { 'content-length': '5000' } },
      'https://img.io/': { body: 'x', headers: { 'content-type': 'image/png' } },
    });

    const report = await crawl(['https://big.io/', 'https://img.io/'], { fetchImpl, maxBytes: 1000 });

    expect(report.failures.map(f => [f.reason, f.detail])).toEqual([
      ['too_large', '5000'],
      ['unsupported_content', 'image/png'],
    ]);
  });

  it('should read at most maxBytes of a body sent without a content-length', async () => {
    const chunk = new TextEncoder().encode('x'.repeat(1000));
    let pulls = 0;
    let cancelled = false;
    const endless = new ReadableStream<Uint8Array>({
      pull(controller) {
        pulls++;
        controller.enqueue(chunk);
      },
      cancel() {
        cancelled = true;
      },
    });
    const fetchImpl = vi.fn<FetchLike>(async () =>
      new Response(endless, { headers: { 'content-type': 'text/plain' } })
    );

    const report = await crawl(['https://stream.io/'], { fetchImpl, maxBytes: 2500 });

    expect(report.pages).toEqual([{ text: 'x'.repeat(2500), url: 'https://stream.io/', depth: 0 }]);
    expect(report.failures).toEqual([]);
    expect(cancelled).toBe(true);
    expect(pulls).toBeLessThanOrEqual(5);
  });

  it('should count the byte cap in bytes, not characters', async () => {
    const fetchImpl = fakeFetch({
      'https://accents.io/': { body: 'é'.repeat(2000), headers: { 'content-type': 'text/plain; charset=utf-8' } },
    });

    const report = await crawl(['https://accents.io/'], { fetchImpl, maxBytes: 1001 });

    expect(report.pages.map(p => p.text)).toEqual(['é'.repeat(500) + '\uFFFD']);
  });

  it('should hand back plain text pages unparsed', async () => {
    const fetchImpl = fakeFetch({
      'https://txt.io/': { body: 'mail <me>: hi@txt.io', headers: { 'content-type': 'text/plain' } },
    });

    const report = await crawl(['https://txt.io/'], { fetchImpl });

    expect(report.pages).toEqual([{ text: 'mail <me>: hi@txt.io', url: 'https://txt.io/', depth: 0 }]);
  });

  it('should fetch each url once and ignore unusable seeds', async () => {
    const fetchImpl = fakeFetch({ 'https://a.io/': { body: '<p>a</p>' } });

    const report = await crawl(['https://a.io', 'https://a.io/#bio', 'mailto:x@a.io', '   '], { fetchImpl });

    expect(report.pages).toHaveLength(1);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('should stop starting fetches once the signal is aborted', async () => {
    const controller = new AbortController();
    const routes = fakeFetch({
      'https://a.io/': { body: '<p>a</p>' },
      'https://b.io/': { body: '<p>b</p>' },
    });
    const fetchImpl = vi.fn<FetchLike>(async (url, init) => {
      const response = await routes(url, init);
      controller.abort();
      return response;
    });

    const report = await crawl(['https://a.io/', 'https://b.io/'], { fetchImpl, signal: controller.signal });

    expect(report.pages.map(p => p.url)).toEqual(['https://a.io/']);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('should hold a quota slot per fetch and release it on failure', async () => {
    const quota = new ConnectionQuota(1);
    const fetchImpl = fakeFetch({
      'https://a.io/': { body: '<p>a</p>' },
      'https://down.io/': 'network-error',
    });

    await crawl(['https://a.io/', 'https://down.io/'], { fetchImpl, quota });

    expect(quota.stats()).toEqual({ capacity: 1, inUse: 0, waiting: 0, granted: 2 });
  });
});

describe('pageText', () => {
  it('should drop script and style content and append attribute values', () => {
    const html = '<p>Email jane@studio.io</p><script>var x = "bot@tracker.io";</script>'
      + '<style>.a { color: red }</style><a href="mailto:booking@studio.io">Book</a>';

    expect(pageText(html)).toBe('Email jane@studio.io Book\nmailto:booking@studio.io');
  });

  it('should separate adjacent blocks', () => {
    expect(pageText('<p>jane@studio.io</p><p>Bookings</p>')).toBe('jane@studio.io Bookings');
  });

  it('should decode entities and include meta content', () => {
    const html = '<head><meta name="description" content="Contact: hi@band.fm"></head><body>jane&#64;band.fm</body>';

    expect(pageText(html)).toBe('jane@band.fm\nContact: hi@band.fm');
  });
});

describe('selectDeepLinks', () => {
  it('should cap the number of links per page', () => {
    const html = Array.from({ length: 8 }, (_, i) => `<a href="https://site${i}.io/">s</a>`).join('');

    const links = selectDeepLinks(html, 'https://linktr.ee/jane', { ...DEFAULT_DEEP_LINK_POLICY, maxLinksPerPage: 3 });

    expect(links).toEqual(['https://site0.io/', 'https://site1.io/', 'https://site2.io/']);
  });

  it('should take one outbound link per site from an aggregator page', () => {
    const html = `
      <a href="https://shop.io/a">Shop</a>
      <a href="https://shop.io/b">Shop again</a>
      <a href="https://www.shop.io/c">Shop once more</a>
      <a href="https://band.co">Band</a>`;

    expect(selectDeepLinks(html, 'https://linktr.ee/jane', DEFAULT_DEEP_LINK_POLICY)).toEqual([
      'https://shop.io/a',
      'https://band.co/',
    ]);
  });

  it('should match keywords in anchor text as well as the path', () => {
    const html = '<a href="/p/42">Contact me</a><a href="/p/43">Gallery</a><a href="tel:123">Call</a>';

    expect(selectDeepLinks(html, 'https://www.jane.studio/', DEFAULT_DEEP_LINK_POLICY)).toEqual([
      'https://www.jane.studio/p/42',
    ]);
  });
});

describe('normalizeUrl', () => {
  it('should add https to bare hosts and drop fragments', () => {
    expect(normalizeUrl('jane.studio')).toBe('https://jane.studio/');
    expect(normalizeUrl('http://jane.studio/a#b')).toBe('http://jane.studio/a');
  });

  it('should reject non-web schemes and garbage', () => {
    expect(normalizeUrl('mailto:x@y.io')).toBeNull();
    expect(normalizeUrl('')).toBeNull();
    expect(normalizeUrl('http://')).toBeNull();
  });

  it('should reject urls carrying credentials, including bare addresses', () => {
    expect(normalizeUrl('jane@studio.io')).toBeNull();
    expect(normalizeUrl('https://user:pw@site.io/')).toBeNull();
  });
});
