import {
  StepScriptCompiler,
  normalizeText,
  resolveLinks,
} from '../../../../src/application/services/automation/StepScriptCompiler';
import { InvalidJobError, StepExecutionError } from '../../../../src/domain/errors/OrchestratorErrors';
import { FakePage, FakeSession } from '../../../fakes/FakeBrowserEngine';

const SEARCH_URL = 'https://listings.test/search?page=1';
const FLAKY_URL = 'https://listings.test/flaky';
const DOWN_URL = 'https://listings.test/down';
const SALES_URL = 'https://listings.test/sales';

const site: Record<string, FakePage> = {
  [SEARCH_URL]: {
    title: 'Search',
    text: {
      h1: ['  Homes   for\n sale  '],
      '.card .price': [' $100 ', '  ', '$200\n'],
    },
    attributes: {
      'a.card': {
        href: ['/property?id=11', '/property?id=22', 'https://other.test/x', '', null],
      },
      img: { src: ['a.png', 'b.png'] },
    },
  },
  [FLAKY_URL]: { statuses: [503, 502, 200], text: { h1: ['Back'] } },
  [DOWN_URL]: { statuses: [500] },
  [SALES_URL]: {
    rows: {
      'tbody tr': [
        { 'td.date': ' 1/2/2025 ', 'td.name': 'Smith,\n  J.', 'a.details@href': ' /sale?id=7' },
        { 'td.name': '', 'a.details@href': '/sale?id=8' },
      ],
    },
  },
};

describe('normalizeText', () => {
  it('should collapse whitespace and trim', () => {
    expect(normalizeText('  Homes   for\n sale  ')).toBe('Homes for sale');
    expect(normalizeText('\t\n')).toBe('');
  });
});

describe('resolveLinks', () => {
  it('should resolve relative hrefs against the page URL', () => {
    expect(resolveLinks(['/a', ' ', 'http://[bad', 'b?x=1'], 'https://s.test/dir/page')).toEqual([
      'https://s.test/a',
      'https://s.test/dir/b?x=1',
    ]);
  });

  it('should return query parameter values when asked', () => {
    expect(resolveLinks(['/p?id=1', '/p', '/p?id=', '/p?other=2&id=3'], 'https://s.test/', 'id')).toEqual([
      '1',
      '3',
    ]);
  });
});

describe('StepScriptCompiler', () => {
  let compiler: StepScriptCompiler;
  let session: FakeSession;

  beforeEach(() => {
    compiler = new StepScriptCompiler();
    session = new FakeSession(site);
  });

  describe('parse', () => {
    it('should apply step defaults', () => {
      const steps = compiler.parse([
        { type: 'extract_text', selector: 'h1', as: 'title' },
        { type: 'extract_links', as: 'links' },
      ]);

      expect(steps).toEqual([
        { type: 'extract_text', selector: 'h1', as: 'title', all: false },
        { type: 'extract_links', selector: 'a[href]', as: 'links' },
      ]);
    });

    it('should default navigation retries and optional flags', () => {
      const steps = compiler.parse([
        { type: 'goto', url: SEARCH_URL },
        { type: 'click', selector: 'h1' },
        { type: 'wait_for', selector: 'h1', optional: true },
      ]);

      expect(steps).toEqual([
        { type: 'goto', url: SEARCH_URL, retries: 0, retryDelayMs: 1000 },
        { type: 'click', selector: 'h1', optional: false },
        { type: 'wait_for', selector: 'h1', optional: true },
      ]);
    });

    it('should reject a row extraction without fields', () => {
      expect(() => compiler.parse([{ type: 'extract_rows', selector: 'tr', fields: {}, as: 'rows' }])).toThrow(
        'Invalid job: invalid step script: 0.fields: At least one field is required'
      );
    });

    it('should reject delays a timer cannot hold', () => {
      expect(() => compiler.parse([{ type: 'wait', ms: 3000000000 }])).toThrow(InvalidJobError);
      expect(() => compiler.parse([{ type: 'click', selector: 'a', timeout: 3000000000 }])).toThrow(
        InvalidJobError
      );
    });

    it('should reject an invalid URL with the failing path', () => {
      expect(() => compiler.parse([{ type: 'goto', url: 'not a url' }])).toThrow(
        'Invalid job: invalid step script: 0.url: Invalid url'
      );
    });

    it('should reject an empty script', () => {
      expect(() => compiler.parse([])).toThrow(InvalidJobError);
    });

    it('should reject unknown step types', () => {
      expect(() => compiler.parse([{ type: 'teleport' }])).toThrow(InvalidJobError);
    });
  });

  describe('compile', () => {
    const run = (input: unknown, signal: AbortSignal = new AbortController().signal) =>
      compiler.compile(compiler.parse(input))(session, signal);

    it('should navigate and collect named extractions', async () => {
      const result = await run([
        { type: 'goto', url: SEARCH_URL },
        { type: 'wait_for', selector: 'h1' },
        { type: 'extract_text', selector: 'h1', as: 'heading' },
        { type: 'extract_text', selector: '.card .price', as: 'prices', all: true },
        { type: 'extract_text', selector: '.missing', as: 'missing' },
        { type: 'extract_attribute', selector: 'img', attribute: 'src', as: 'image' },
        { type: 'extract_attribute', selector: 'img', attribute: 'src', as: 'images', all: true },
        { type: 'extract_links', selector: 'a.card', as: 'links' },
        { type: 'extract_links', selector: 'a.card', as: 'ids', queryParam: 'id' },
      ]);

      expect(result).toEqual({
        heading: 'Homes for sale',
        prices: ['$100', '$200'],
        missing: null,
        image: 'a.png',
        images: ['a.png', 'b.png'],
        links: [
          'https://listings.test/property?id=11',
          'https://listings.test/property?id=22',
          'https://other.test/x',
        ],
        ids: ['11', '22'],
      });
    });

    it('should run interaction steps in order', async () => {
      await run([
        { type: 'goto', url: SEARCH_URL },
        { type: 'fill', selector: 'h1', value: 'x' },
        { type: 'click', selector: 'h1' },
        { type: 'hover', selector: 'img' },
        { type: 'select', selector: 'img', value: 'b' },
      ]);

      expect(session.calls).toEqual([
        `navigate ${SEARCH_URL}`,
        'fill h1=x',
        'click h1',
        'hover img',
        'select img=b',
      ]);
    });

    it('should skip optional steps that fail', async () => {
      const result = await run([
        { type: 'goto', url: SEARCH_URL },
        { type: 'click', selector: '#accept-cookies', optional: true },
        { type: 'wait_for', selector: '.banner', timeout: 10, optional: true },
        { type: 'extract_text', selector: 'h1', as: 'heading' },
      ]);

      expect(result).toEqual({ heading: 'Homes for sale' });
      expect(session.calls).toEqual([`navigate ${SEARCH_URL}`, 'click #accept-cookies', 'wait_for .banner']);
    });

    it('should retry a navigation that answers with an error status', async () => {
      const started = Date.now();

      const result = await run([
        { type: 'goto', url: FLAKY_URL, retries: 2, retryDelayMs: 10 },
        { type: 'extract_text', selector: 'h1', as: 'heading' },
      ]);

      expect(result).toEqual({ heading: 'Back' });
      expect(session.calls).toEqual([`navigate ${FLAKY_URL}`, `navigate ${FLAKY_URL}`, `navigate ${FLAKY_URL}`]);
      // 10ms then 20ms of backoff
      expect(Date.now() - started).toBeGreaterThanOrEqual(28);
    });

    it('should fail with the last status once retries run out', async () => {
      await expect(run([{ type: 'goto', url: DOWN_URL, retries: 1, retryDelayMs: 1 }])).rejects.toThrow(
        `Step 0 (goto) failed: HTTP 500 for ${DOWN_URL}`
      );
      expect(session.calls).toEqual([`navigate ${DOWN_URL}`, `navigate ${DOWN_URL}`]);
    });

    it('should fail on an error status without retries', async () => {
      await expect(run([{ type: 'goto', url: DOWN_URL }])).rejects.toThrow(
        `Step 0 (goto) failed: HTTP 500 for ${DOWN_URL}`
      );
      expect(session.calls).toHaveLength(1);
    });

    it('should retry navigation errors too', async () => {
      const unknown = 'https://unknown.test/';

      await expect(run([{ type: 'goto', url: unknown, retries: 1, retryDelayMs: 1 }])).rejects.toThrow(
        `Step 0 (goto) failed: net::ERR_NAME_NOT_RESOLVED at ${unknown}`
      );
      expect(session.calls).toEqual([`navigate ${unknown}`, `navigate ${unknown}`]);
    });

    it('should extract one aligned record per row', async () => {
      const result = await run([
        { type: 'goto', url: SALES_URL },
        {
          type: 'extract_rows',
          selector: 'tbody tr',
          fields: {
            date: 'td.date',
            name: { selector: 'td.name' },
            details: { selector: 'a.details', attribute: 'href' },
          },
          as: 'sales',
        },
      ]);

      expect(result).toEqual({
        sales: [
          { date: '1/2/2025', name: 'Smith, J.', details: ' /sale?id=7' },
          { date: null, name: '', details: '/sale?id=8' },
        ],
      });
    });

    it('should store evaluated values only when named', async () => {
      jest.spyOn(session, 'evaluate').mockResolvedValue(3);

      const result = await run([
        { type: 'evaluate', script: 'document.links.length', as: 'count' },
        { type: 'evaluate', script: 'window.scrollTo(0, 0)' },
      ]);

      expect(result).toEqual({ count: 3 });
    });

    it('should report which step failed', async () => {
      const attempt = run([
        { type: 'goto', url: SEARCH_URL },
        { type: 'click', selector: '#missing' },
      ]);

      await expect(attempt).rejects.toThrow(StepExecutionError);
      await expect(attempt).rejects.toThrow('Step 1 (click) failed: Timeout waiting for selector "#missing"');
    });

    it('should stop before the first step when already aborted', async () => {
      const controller = new AbortController();
      controller.abort('stop');

      await expect(run([{ type: 'goto', url: SEARCH_URL }], controller.signal)).rejects.toBe('stop');
      expect(session.calls).toEqual([]);
    });

    it('should interrupt a wait without wrapping the abort reason', async () => {
      const controller = new AbortController();
      setTimeout(() => controller.abort('deadline exceeded'), 10);

      await expect(run([{ type: 'wait', ms: 1000 }], controller.signal)).rejects.toBe('deadline exceeded');
    });
  });
});
