import { existsSync } from 'fs';
import { platform } from 'os';
import { InvalidInputError } from './errors.js';

/** Extra flags passed to a locally launched Chrome. */
export const CHROME_ARGS = [
  '--window-size=1280,720',
  '--disable-blink-features=AutomationControlled',
];

/**
 * Well-known Chrome/Chromium install locations for an operating system.
 */
export function chromeCandidates(
  systemPlatform: NodeJS.Platform,
  env: NodeJS.ProcessEnv = process.env,
): string[] {
  if (systemPlatform === 'darwin') {
    return [
      '/Applications/Google Chrome.app/Contents/MacOS/Google Chrome',
      '/Applications/Chromium.app/Contents/MacOS/Chromium',
      `${env.HOME}/Applications/Google Chrome.app/Contents/MacOS/Google Chrome`,
      `${env.HOME}/Applications/Chromium.app/Contents/MacOS/Chromium`,
    ];
  }
  if (systemPlatform === 'win32') {
    return [
      'C:\\Program Files\\Google\\Chrome\\Application\\chrome.exe',
      'C:\\Program Files (x86)\\Google\\Chrome\\Application\\chrome.exe',
      `${env.LOCALAPPDATA}\\Google\\Chrome\\Application\\chrome.exe`,
      'C:\\Program Files\\Chromium\\Application\\chrome.exe',
    ];
  }
  return [
    '/usr/bin/google-chrome',
    '/usr/bin/google-chrome-stable',
    '/usr/bin/chromium',
    '/usr/bin/chromium-browser',
    '/snap/bin/chromium',
    '/usr/local/bin/google-chrome',
    '/usr/local/bin/chromium',
    '/opt/google/chrome/chrome',
  ];
}

/**
 * Finds the local Chrome installation path based on the operating system.
 */
export function findLocalChrome(
  exists: (path: string) => boolean = existsSync,
  systemPlatform: NodeJS.Platform = platform(),
): string | undefined {
  return chromeCandidates(systemPlatform).find((p) => exists(p));
}

/**
 * Checks a navigation target. The URL needs both a scheme and a host, so
 * `about:blank` and bare hostnames are rejected.
 */
export function validatePageUrl(url: string | undefined): string {
  if (!url || url.trim() === '') {
    throw new InvalidInputError('URL is required');
  }

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new InvalidInputError('Invalid URL format');
  }
  if (!parsed.protocol || !parsed.host) {
    throw new InvalidInputError('Invalid URL format');
  }
  return url;
}
