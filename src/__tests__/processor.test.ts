import { RenderTimeoutError, SessionInvalidError, TransportError } from '../errors';
import { PageProcessor, ProcessorOptions } from '../processor';
import { SessionManager } from '../session';
import * as utils from '../utils';
import { FakeBrowser, page, scripted, silenceConsole } from './helpers/fake-browser';

const URL_A = 'https://www.example.test/contact';

const options: ProcessorOptions = {
  match: 'contact.sigma-rh.com',
  maxRetries: 3,
  renderTimeoutMs: 6000,
  settleDelayMs: 0,
  retryDelayMs: 0,
  sessionRecoveryDelayMs: 0,
};

const FORM_PAGE = page('<iframe src="https://contact.sigma-rh.com/form?id=9" title="Contact"></iframe>');
const EMPTY_PAGE = page('<p>Nothing to see</p>');

describe('PageProcessor', () => {
  beforeEach(() => {
    silenceConsole();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('returns matched after a single attempt when iframes are found', async () => {
    const browser = scripted([
      page(
        '<iframe src="https://contact.sigma-rh.com/a"></iframe>' +
          '<iframe src="https://maps.example.test/embed"></iframe>' +
          '<iframe src="https://contact.sigma-rh.com/b"></iframe>',
      ),
    ]);
    const processor = new PageProcessor(options);

    const result = await processor.process(URL_A, new SessionManager(browser.factory));

    expect(result.status).toBe('matched');
    if (result.status !== 'matched') return;
    expect(result.entries.map((e) => e.srcUrl)).toEqual([
      'https://contact.sigma-rh.com/a',
      'https://contact.sigma-rh.com/b',
    ]);
    expect(result.attempts).toBe(1);
    expect(browser.renders).toHaveLength(1);
  });

  it('passes the render timeout and settle delay to the session', async () => {
    const browser = scripted([FORM_PAGE]);
    const processor = new PageProcessor({ ...options, renderTimeoutMs: 12000, settleDelayMs: 1500 });

    await processor.process(URL_A, new SessionManager(browser.factory));

    expect(browser.renders[0].options).toEqual({ timeoutMs: 12000, settleMs: 1500 });
  });

  it('keeps the src and markup of the qualifying iframe verbatim', async () => {
    const browser = scripted([FORM_PAGE]);
    const result = await new PageProcessor(options).process(URL_A, new SessionManager(browser.factory));

    expect(result.status).toBe('matched');
    if (result.status !== 'matched') return;
    expect(result.entries).toHaveLength(1);
    expect(result.entries[0].pageUrl).toBe(URL_A);
    expect(result.entries[0].srcUrl).toBe('https://contact.sigma-rh.com/form?id=9');
    expect(result.entries[0].iframeHtml).toContain('src="https://contact.sigma-rh.com/form?id=9"');
  });

  it('treats iframes inside noscript as no match', async () => {
    const html = page('<noscript><iframe src="https://contact.sigma-rh.com/x"></iframe></noscript>');
    const browser = scripted([html]);

    const result = await new PageProcessor(options).process(URL_A, new SessionManager(browser.factory));

    expect(result).toEqual({ status: 'no-match', pageUrl: URL_A, html, attempts: 1 });
  });

  it('does not retry a clean negative', async () => {
    const browser = scripted([EMPTY_PAGE, FORM_PAGE]);

    const result = await new PageProcessor(options).process(URL_A, new SessionManager(browser.factory));

    expect(result.status).toBe('no-match');
    expect(browser.renders).toHaveLength(1);
  });

  it('gives the same outcome for unchanged content', async () => {
    const browser = new FakeBrowser(() => FORM_PAGE);
    const sessions = new SessionManager(browser.factory);
    const processor = new PageProcessor(options);

    const first = await processor.process(URL_A, sessions);
    const second = await processor.process(URL_A, sessions);

    expect(second).toEqual(first);
  });

  it('fails after exactly maxRetries transport errors', async () => {
    const browser = scripted([
      new TransportError('net::ERR_CONNECTION_RESET', URL_A),
      new RenderTimeoutError(URL_A, 6000),
      new TransportError('net::ERR_CONNECTION_REFUSED', URL_A),
      FORM_PAGE,
    ]);

    const result = await new PageProcessor(options).process(URL_A, new SessionManager(browser.factory));

    expect(result).toEqual({
      status: 'failed',
      pageUrl: URL_A,
      attempts: 3,
      error: 'net::ERR_CONNECTION_REFUSED',
    });
    expect(browser.renders).toHaveLength(3);
    expect(browser.sessions).toHaveLength(1);
  });

  it('honours an explicit retry budget', async () => {
    const browser = new FakeBrowser(() => {
      throw new TransportError('boom', URL_A);
    });

    const result = await new PageProcessor(options).process(URL_A, new SessionManager(browser.factory), 5);

    expect(result.attempts).toBe(5);
    expect(browser.renders).toHaveLength(5);
  });

  it('returns the result of a successful retry', async () => {
    const browser = scripted([new TransportError('net::ERR_TIMED_OUT', URL_A), FORM_PAGE]);

    const result = await new PageProcessor(options).process(URL_A, new SessionManager(browser.factory));

    expect(result.status).toBe('matched');
    expect(result.attempts).toBe(2);
    expect(browser.renders).toHaveLength(2);
  });

  it('recreates the session before the next attempt after a session fault', async () => {
    const browser = scripted([
      new TransportError('net::ERR_CONNECTION_RESET', URL_A),
      new SessionInvalidError('Target page, context or browser has been closed', 1),
      FORM_PAGE,
    ]);
    const sessions = new SessionManager(browser.factory);

    const result = await new PageProcessor(options).process(URL_A, sessions);

    expect(result.status).toBe('matched');
    expect(browser.renders.map((r) => r.sessionId)).toEqual([1, 1, 2]);
    expect(browser.sessions[0].closed).toBe(true);
    expect(sessions.current()).toBe(browser.sessions[1]);
  });

  it('recreates the session even when the fault uses up the last attempt', async () => {
    const browser = scripted([
      new TransportError('reset', URL_A),
      new TransportError('reset', URL_A),
      new SessionInvalidError('Browser has been closed', 1),
    ]);
    const sessions = new SessionManager(browser.factory);

    const result = await new PageProcessor(options).process(URL_A, sessions);

    expect(result.status).toBe('failed');
    expect(browser.sessions).toHaveLength(2);
    expect(sessions.current()?.id).toBe(2);
  });

  it('counts a failed session launch as an attempt', async () => {
    const browser = new FakeBrowser(() => FORM_PAGE);
    let launches = 0;
    const sessions = new SessionManager(async () => {
      launches++;
      if (launches === 1) throw new Error('browserType.launch: Executable doesn\'t exist');
      return browser.factory();
    });

    const result = await new PageProcessor(options).process(URL_A, sessions);

    expect(result.status).toBe('matched');
    expect(result.attempts).toBe(2);
  });

  it('never throws, whatever the session throws', async () => {
    const browser = new FakeBrowser(() => {
      throw 'not an error object';
    });

    const result = await new PageProcessor({ ...options, maxRetries: 1 }).process(
      URL_A,
      new SessionManager(browser.factory),
    );

    expect(result).toEqual({ status: 'failed', pageUrl: URL_A, attempts: 1, error: 'not an error object' });
  });

  describe('waits', () => {
    const timed: ProcessorOptions = { ...options, retryDelayMs: 5000, sessionRecoveryDelayMs: 2000 };
    let sleeps: number[];

    beforeEach(() => {
      sleeps = [];
      jest.spyOn(utils, 'sleep').mockImplementation(async (ms: number) => {
        sleeps.push(ms);
      });
    });

    it('backs off between attempts but not after the last one', async () => {
      const browser = scripted([
        new TransportError('reset', URL_A),
        new TransportError('reset', URL_A),
        new TransportError('reset', URL_A),
      ]);

      await new PageProcessor(timed).process(URL_A, new SessionManager(browser.factory));

      expect(sleeps).toEqual([5000, 5000]);
    });

    it('adds the recovery delay after a session fault', async () => {
      const browser = scripted([
        new TransportError('reset', URL_A),
        new SessionInvalidError('Browser has been closed', 1),
        new TransportError('reset', URL_A),
      ]);

      const result = await new PageProcessor(timed).process(URL_A, new SessionManager(browser.factory));

      expect(result.status).toBe('failed');
      expect(sleeps).toEqual([5000, 2000, 5000]);
      expect(browser.renders.map((r) => r.sessionId)).toEqual([1, 1, 2]);
    });

    it('does not wait after a session fault on the last attempt', async () => {
      const browser = scripted([new SessionInvalidError('Browser has been closed', 1)]);

      await new PageProcessor({ ...timed, maxRetries: 1 }).process(URL_A, new SessionManager(browser.factory));

      expect(sleeps).toEqual([]);
      expect(browser.sessions).toHaveLength(2);
    });

    it('does not wait after a clean negative or a match', async () => {
      const browser = scripted([EMPTY_PAGE, FORM_PAGE]);
      const sessions = new SessionManager(browser.factory);
      const processor = new PageProcessor(timed);

      await processor.process(URL_A, sessions);
      await processor.process(URL_A, sessions);

      expect(sleeps).toEqual([]);
    });
  });
});
