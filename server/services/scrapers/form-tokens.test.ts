import { describe, it, expect } from 'vitest';
import { readFileSync } from 'fs';
import {
  buildPostback,
  extractFormTokens,
  findPagerPostback,
  findSubmitButton,
  formAction,
} from './form-tokens';

const fixture = (name: string) =>
  readFileSync(new URL(`./__fixtures__/${name}`, import.meta.url), 'utf8');

describe('extractFormTokens', () => {
  it('collects every hidden input of the form', () => {
    expect(extractFormTokens(fixture('disclaimer.html'))).toEqual({
      __VIEWSTATE: 'disc-vs',
      __VIEWSTATEGENERATOR: 'A1B2C3D4',
      __EVENTVALIDATION: 'disc-ev',
    });
  });

  it('returns null when the view state is missing', () => {
    expect(extractFormTokens(fixture('challenge.html'))).toBeNull();
    expect(extractFormTokens('<form><input type="hidden" name="__VIEWSTATE" value="" /></form>')).toBeNull();
  });
});

describe('formAction', () => {
  it('resolves the action against the page URL', () => {
    expect(formAction(fixture('search.html'), 'https://portal.test/york/courtrosters/Disclaimer.aspx'))
      .toBe('https://portal.test/york/courtrosters/Roster.aspx');
  });

  it('posts back to the page itself without an action', () => {
    expect(formAction('<form method="post"></form>', 'https://portal.test/a.aspx')).toBe('https://portal.test/a.aspx');
  });
});

describe('findSubmitButton', () => {
  it('finds the accept button by its label', () => {
    expect(findSubmitButton(fixture('disclaimer.html'), /^\s*(I\s+)?Accept/i)).toEqual({
      name: 'ctl00$MainContent$btnAccept',
      value: 'Accept',
    });
  });

  it('returns null on a page without one', () => {
    expect(findSubmitButton(fixture('search.html'), /^\s*(I\s+)?Accept/i)).toBeNull();
  });
});

describe('findPagerPostback', () => {
  it('returns the postback for the requested page', () => {
    expect(findPagerPostback(fixture('roster-page-1.html'), 2)).toEqual({
      target: 'ctl00$MainContent$gvRoster',
      argument: 'Page$2',
    });
  });

  it('returns null past the last page', () => {
    expect(findPagerPostback(fixture('roster-page-2.html'), 3)).toBeNull();
  });

  it('falls back to a Next link', () => {
    const html = `<a href="javascript:__doPostBack('grid','Page$Next')">Next</a>`;
    expect(findPagerPostback(html, 7)).toEqual({ target: 'grid', argument: 'Page$Next' });
  });
});

describe('buildPostback', () => {
  it('blanks the event fields unless overridden', () => {
    expect(buildPostback({ __VIEWSTATE: 'vs', __EVENTTARGET: 'stale' }, { 'ctl00$MainContent$btnSearch': 'Search' }))
      .toEqual({
        __VIEWSTATE: 'vs',
        __EVENTTARGET: '',
        __EVENTARGUMENT: '',
        'ctl00$MainContent$btnSearch': 'Search',
      });
  });
});
