import type { Locator, Page } from 'playwright-core';

export interface SessionElement {
  text(): Promise<string>;
  attribute(name: string): Promise<string | null>;
  innerHTML(): Promise<string>;
  click(): Promise<void>;
}

/**
 * The browser capabilities the navigator and orchestrator rely on.
 * One session is driven strictly sequentially.
 */
export interface WebSession {
  navigate(url: string): Promise<void>;
  content(): Promise<string>;
  findElement(selector: string): Promise<SessionElement | null>;
  findElements(selector: string): Promise<SessionElement[]>;
  /** Pick the `<option>` with the given visible label in a `<select>`. */
  selectOption(selector: string, label: string): Promise<void>;
  executeScript(script: string): Promise<void>;
}

class LocatorElement implements SessionElement {
  constructor(
    private readonly locator: Locator,
    private readonly timeoutMs: number
  ) {}

  async text(): Promise<string> {
    return ((await this.locator.textContent({ timeout: this.timeoutMs })) || '').trim();
  }

  attribute(name: string): Promise<string | null> {
    return this.locator.getAttribute(name, { timeout: this.timeoutMs });
  }

  innerHTML(): Promise<string> {
    return this.locator.innerHTML({ timeout: this.timeoutMs });
  }

  async click(): Promise<void> {
    await this.locator.click({ timeout: this.timeoutMs });
  }
}

export class PlaywrightSession implements WebSession {
  constructor(
    private readonly page: Page,
    private readonly timeoutMs: number = 30000
  ) {}

  async navigate(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.timeoutMs });
  }

  content(): Promise<string> {
    return this.page.content();
  }

  async findElement(selector: string): Promise<SessionElement | null> {
    const locator = this.page.locator(selector).first();
    return (await locator.count()) > 0 ? new LocatorElement(locator, this.timeoutMs) : null;
  }

  async findElements(selector: string): Promise<SessionElement[]> {
    const locators = await this.page.locator(selector).all();
    return locators.map((locator) => new LocatorElement(locator, this.timeoutMs));
  }

  async selectOption(selector: string, label: string): Promise<void> {
    await this.page.selectOption(selector, { label }, { timeout: this.timeoutMs });
  }

  async executeScript(script: string): Promise<void> {
    await this.page.evaluate(script);
  }
}
