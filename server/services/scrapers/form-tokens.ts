import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';

/** Hidden inputs of the page's WebForms form, keyed by name. */
export type FormTokens = Readonly<Record<string, string>>;

export interface PostbackLink {
  target: string;
  argument: string;
}

export interface SubmitButton {
  name: string;
  value: string;
}

const POSTBACK_PATTERN = /__doPostBack\(\s*'([^']*)'\s*,\s*'([^']*)'\s*\)/;

function load(html: string | CheerioAPI): CheerioAPI {
  return typeof html === 'string' ? cheerio.load(html) : html;
}

/**
 * Every hidden input of the first form. Null when __VIEWSTATE is missing
 * or empty: without it the server rejects the postback.
 */
export function extractFormTokens(html: string | CheerioAPI): FormTokens | null {
  const $ = load(html);
  const form = $('form').first();
  const inputs = form.length > 0 ? form.find('input[type="hidden"]') : $('input[type="hidden"]');

  const tokens: Record<string, string> = {};
  inputs.each((_, element) => {
    const name = $(element).attr('name');
    if (name) tokens[name] = $(element).attr('value') ?? '';
  });

  return tokens.__VIEWSTATE ? tokens : null;
}

export function formAction(html: string | CheerioAPI, pageUrl: string): string {
  const $ = load(html);
  const action = $('form').first().attr('action');
  return action ? new URL(action, pageUrl).toString() : pageUrl;
}

export function findSubmitButton(html: string | CheerioAPI, valuePattern: RegExp): SubmitButton | null {
  const $ = load(html);
  let found: SubmitButton | null = null;
  $('input[type="submit"], button[type="submit"]').each((_, element) => {
    const input = $(element);
    const value = input.attr('value') ?? input.text();
    const name = input.attr('name');
    if (name && valuePattern.test(value)) {
      found = { name, value: value.trim() };
      return false;
    }
    return undefined;
  });
  return found;
}

/** All __doPostBack('target','argument') links on the page. */
export function parsePostbackLinks(html: string | CheerioAPI): PostbackLink[] {
  const $ = load(html);
  const links: PostbackLink[] = [];
  $('a[href*="__doPostBack"]').each((_, element) => {
    const match = POSTBACK_PATTERN.exec($(element).attr('href') ?? '');
    if (match) links.push({ target: match[1], argument: match[2] });
  });
  return links;
}

/**
 * Postback for results page `page`. GridView pagers link every visible
 * page as Page$N (the "..." link too); NextPrev pagers use Page$Next.
 */
export function findPagerPostback(html: string | CheerioAPI, page: number): PostbackLink | null {
  const links = parsePostbackLinks(html);
  return links.find(link => link.argument === `Page$${page}`)
    ?? links.find(link => link.argument === 'Page$Next')
    ?? null;
}

/** Build the urlencoded body for a postback, blanking event fields unless given. */
export function buildPostback(tokens: FormTokens, fields: Record<string, string>): Record<string, string> {
  return {
    ...tokens,
    __EVENTTARGET: '',
    __EVENTARGUMENT: '',
    ...fields,
  };
}
