/**
 * Page Context
 *
 * Wraps the lifecycle of one browser and page for a single scrape job.
 * The browser runs headful by default: login needs a person to solve the
 * captcha/OTP in the opened window.
 *
 * Usage:
 *   const ctx = new PageContext();
 *   try {
 *     const page = await ctx.open();
 *     // ... scrape ...
 *   } finally {
 *     await ctx.close();
 *   }
 */
import puppeteer from "puppeteer-core";
import type { Browser, Page } from "puppeteer-core";
import config from "../../config";
import { logger } from "../../monitoring/logger";
import { errorMessage } from "../../shared/errors/service.error";

export interface PageContextOptions {
  executablePath?: string;
  headless?: boolean;
  pageTimeoutMs?: number;
}

export class PageContext {
  private browser: Browser | null = null;
  private page: Page | null = null;
  private readonly options: Required<PageContextOptions>;

  constructor(options: PageContextOptions = {}) {
    this.options = {
      executablePath: options.executablePath ?? config.chromeExecutablePath,
      headless: options.headless ?? config.browserHeadless,
      pageTimeoutMs: options.pageTimeoutMs ?? config.pageTimeoutMs,
    };
  }

  /** Launch the browser and open a maximized page */
  async open(): Promise<Page> {
    this.browser = await puppeteer.launch({
      executablePath: this.options.executablePath,
      headless: this.options.headless,
      defaultViewport: null,
      args: ["--start-maximized", "--no-first-run", "--no-default-browser-check"],
    });
    this.page = await this.browser.newPage();

    this.page.setDefaultTimeout(this.options.pageTimeoutMs);
    this.page.setDefaultNavigationTimeout(this.options.pageTimeoutMs);

    this.page.on("dialog", (dialog) => {
      logger.info({ type: dialog.type(), message: dialog.message() }, "Dismissing portal dialog");
      dialog.dismiss().catch((error: unknown) => {
        logger.debug({ error: errorMessage(error) }, "Dialog already closed");
      });
    });

    logger.info({ headless: this.options.headless }, "Browser launched");
    return this.page;
  }

  /**
   * Close the page and the browser.
   * Safe to call multiple times.
   */
  async close(): Promise<void> {
    if (this.page) {
      try {
        await this.page.close();
      } catch (error) {
        logger.warn({ error: errorMessage(error) }, "Failed to close page");
      }
      this.page = null;
    }

    if (this.browser) {
      try {
        await this.browser.close();
      } catch (error) {
        logger.warn({ error: errorMessage(error) }, "Failed to close browser");
      }
      this.browser = null;
    }
  }
}
