/**
 * Page Probe
 *
 * Reads the observable signals the state encoder needs from a cheap first
 * look at a page's HTML. It only detects markers; it does not extract content.
 */

import * as cheerio from 'cheerio';
import type { PageFeatures } from '../rl/types';

const CAPTCHA_SELECTORS = [
  '#captcha-challenge',
  '.captcha',
  '.g-recaptcha',
  '.h-captcha',
  'iframe[src*="recaptcha"]',
  'iframe[src*="hcaptcha"]',
  'iframe[src*="challenges.cloudflare.com"]',
];

const SPINNER_SELECTORS = ['.loading', '.spinner', '.loader', '[aria-busy="true"]'];

const LOGIN_WALL_SELECTORS = ['input[type="password"]'];

export interface ProbeOptions {
  priorFailures?: number;
}

function matchesAny($: cheerio.CheerioAPI, selectors: string[]): boolean {
  return selectors.some((selector) => $(selector).length > 0);
}

export function probePage(html: string, options: ProbeOptions = {}): PageFeatures {
  const $ = cheerio.load(html);

  return {
    htmlSize: Buffer.byteLength(html, 'utf-8'),
    hasScripts: $('script').length > 0,
    obstructions: {
      captcha: matchesAny($, CAPTCHA_SELECTORS),
      spinner: matchesAny($, SPINNER_SELECTORS),
      loginWall: matchesAny($, LOGIN_WALL_SELECTORS),
    },
    priorFailures: options.priorFailures,
  };
}
