import { promises as fsp } from "fs";
import puppeteer from "puppeteer-core";
import { logger } from "../logger";
import type { PageDriver } from "./page-driver";
import { PuppeteerPageDriver } from "./puppeteer-page-driver";

export interface BrowserLaunchSettings {
  headless: boolean;
  executablePath: string;
  channel: string;
  profileDirectory: string;
  cacheDirectory: string;
  downloadDirectory: string;
  slowMo: number;
  protocolTimeout: number;
}

export type BrowserLauncher = (settings: BrowserLaunchSettings) => Promise<PageDriver>;

type LaunchOptions = NonNullable<Parameters<typeof puppeteer.launch>[0]>;

const CHROME_CHANNELS = ["chrome", "chrome-beta", "chrome-dev", "chrome-canary"] as const;

const CORRUPTED_CACHE_PATTERNS = [
  /Failed to launch the browser process/i,
  /Browser was not found/i,
  /Could not find (Chrome|expected browser)/i,
  /spawn .* (ENOENT|EACCES)/i,
  /exec format error/i,
  /Target closed|Session closed|crashed/i,
];

export function buildLaunchOptions(settings: BrowserLaunchSettings): LaunchOptions {
  const args = [
    "--disable-blink-features=AutomationControlled",
    "--no-sandbox",
    "--disable-setuid-sandbox",
    "--disable-dev-shm-usage",
    "--disable-gpu",
    "--disable-extensions",
    "--ignore-certificate-errors",
    "--window-size=1920,1080",
  ];
  if (settings.cacheDirectory) {
    args.push(`--disk-cache-dir=${settings.cacheDirectory}`);
  }

  const options: LaunchOptions = {
    headless: settings.headless,
    slowMo: settings.slowMo,
    protocolTimeout: settings.protocolTimeout,
    userDataDir: settings.profileDirectory,
    ignoreDefaultArgs: ["--enable-automation"],
    args,
    defaultViewport: { width: 1920, height: 1080 },
  };

  if (settings.executablePath) {
    options.executablePath = settings.executablePath;
  } else {
    options.channel =
      CHROME_CHANNELS.find((channel) => channel === settings.channel) ?? "chrome";
  }
  return options;
}

export function isCorruptedBrowserCacheError(error: unknown): boolean {
  const message = error instanceof Error ? error.message : String(error);
  return CORRUPTED_CACHE_PATTERNS.some((pattern) => pattern.test(message));
}

/** Deletes the browser disk cache. Returns false when there is nothing to clear. */
export async function clearBrowserCache(cacheDirectory: string): Promise<boolean> {
  if (!cacheDirectory) return false;
  await fsp.rm(cacheDirectory, { recursive: true, force: true });
  logger.warn(`[Browser] Cache cleared: ${cacheDirectory}`);
  return true;
}

export const launchPortalBrowser: BrowserLauncher = async (settings) => {
  const browser = await puppeteer.launch(buildLaunchOptions(settings));
  try {
    const [existing] = await browser.pages();
    const page = existing ?? (await browser.newPage());

    await page.evaluateOnNewDocument(() => {
      Object.defineProperty(navigator, "webdriver", { get: () => undefined });
    });
    await page.setExtraHTTPHeaders({
      "Accept-Language": "it-IT,it;q=0.9,en-US;q=0.8,en;q=0.7",
    });

    const driver = new PuppeteerPageDriver(browser, page);
    await fsp.mkdir(settings.downloadDirectory, { recursive: true });
    await driver.setDownloadDirectory(settings.downloadDirectory);

    logger.info("[Browser] Browser inizializzato", {
      headless: settings.headless,
      profile: settings.profileDirectory,
    });
    return driver;
  } catch (error) {
    await browser.close();
    throw error;
  }
};
