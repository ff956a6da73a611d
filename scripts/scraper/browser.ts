import { ElementHandle, Page, chromium, errors } from 'playwright';
import { NavigationError } from './errors';
import { log } from './logger';
import type { BrowserSession, PageDriver, ScrapeConfig, WaitPolicy } from './types';

export type Handle = ElementHandle<SVGElement | HTMLElement>;

export const USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
];

export const pickUserAgent = (random: () => number = Math.random): string =>
  USER_AGENTS[Math.floor(random() * USER_AGENTS.length) % USER_AGENTS.length];

export class PlaywrightPage implements PageDriver<Handle> {
  constructor(private readonly page: Page) {}

  async navigate(url: string, waitPolicy: WaitPolicy, timeoutMs: number): Promise<void> {
    try {
      await this.page.goto(url, { waitUntil: waitPolicy, timeout: timeoutMs });
    } catch (err) {
      throw new NavigationError(url, err instanceof errors.TimeoutError ? 'timeout' : 'network', err);
    }
  }

  queryAll(selector: string, within?: Handle): Promise<Handle[]> {
    return within ? within.$$(selector) : this.page.$$(selector);
  }

  text(el: Handle): Promise<string> {
    return el.innerText();
  }

  attr(el: Handle, name: string): Promise<string | null> {
    return el.getAttribute(name);
  }

  content(): Promise<string> {
    return this.page.content();
  }

  bodyText(): Promise<string> {
    return this.page.innerText('body');
  }
}

/** Launches chromium with one context and one page; `close` tears all of it down. */
export async function launchSession(
  config: Pick<ScrapeConfig, 'headless'>,
  random: () => number = Math.random
): Promise<BrowserSession<Handle>> {
  const userAgent = pickUserAgent(random);
  const browser = await chromium.launch({
    headless: config.headless,
    args: ['--no-sandbox', '--disable-dev-shm-usage', '--disable-blink-features=AutomationControlled'],
  });
  try {
    const context = await browser.newContext({ userAgent, viewport: { width: 1920, height: 1080 } });
    const page = await context.newPage();
    log(`🌐 Browser session opened (${userAgent.slice(0, 60)}...)`);
    return {
      page: new PlaywrightPage(page),
      close: async () => {
        await browser.close();
        log('Browser closed.');
      },
    };
  } catch (err) {
    await browser.close();
    throw err;
  }
}
