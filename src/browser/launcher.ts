import { chromium, Browser, BrowserContext } from 'playwright-core';
import { ENV } from '../config/env';
import { logger } from '../utils/logger';
import { PlaywrightSession } from './session';

export interface BrowserHandle {
  session: PlaywrightSession;
  close(): Promise<void>;
}

export async function launchBrowser(headed?: boolean): Promise<BrowserHandle> {
  const headless = headed !== undefined ? !headed : ENV.HEADLESS;

  logger.info(`Launching Chrome (headless: ${headless})...`);
  const browser: Browser = await chromium.launch({
    headless,
    channel: 'chrome',
  });

  const context: BrowserContext = await browser.newContext({
    userAgent:
      'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36',
    viewport: { width: 1440, height: 900 },
  });

  // Block unnecessary resources to speed up loading
  await context.route(
    /\.(png|jpg|jpeg|gif|svg|webp|ico|woff|woff2|ttf|eot)(\?.*)?$/,
    (route) => route.abort()
  );

  const page = await context.newPage();
  logger.info('Browser launched successfully');

  return {
    session: new PlaywrightSession(page, ENV.PAGE_TIMEOUT_MS),
    async close() {
      await context.close();
      await browser.close();
      logger.info('Browser closed');
    },
  };
}
