import type { RawCaseRecord } from '@shared/schema';
import { Logger } from '../logger';
import { ExtractionError, SessionExpiredError } from '../errors';
import type { SessionContext } from '../session-context';
import type { PortalSiteConfig } from '../site-config';
import { pacedFetch, type PacedFetchOptions } from '../transports';
import type { RequestSpec, Transport, TransportResponse } from '../transports/types';
import {
  buildPostback,
  extractFormTokens,
  findPagerPostback,
  findSubmitButton,
  formAction,
  type FormTokens,
  type PostbackLink,
  type SubmitButton,
} from './form-tokens';
import { extractRoster } from './roster-extractor';

export type NavigatorPhase = 'landing' | 'disclaimer' | 'search' | 'results' | 'done';

/**
 * Where the form protocol stands between round trips. Never mutated: every
 * response produces a new state.
 */
export interface NavigatorState {
  readonly phase: NavigatorPhase;
  readonly actionUrl: string;
  readonly tokens: FormTokens | null;
  readonly acceptButton: SubmitButton | null;
  readonly nextPage: PostbackLink | null;
  readonly caseTypeIndex: number;
  /** Last results page received for the current filter, 0 before the first */
  readonly pageIndex: number;
  readonly restarts: number;
}

export interface RosterPage {
  caseType: string;
  pageIndex: number;
  url: string;
  records: RawCaseRecord[];
  malformedRows: number;
  hasNextPage: boolean;
  /** Already yielded earlier in this run, fetched again after a session restart */
  revisited: boolean;
}

export interface StepResult {
  state: NavigatorState;
  page: RosterPage | null;
}

export const MAX_RESTARTS = 1;

export function initialNavigatorState(
  config: PortalSiteConfig,
  carry: { caseTypeIndex?: number; restarts?: number } = {}
): NavigatorState {
  return {
    phase: config.caseTypes.length > 0 ? 'landing' : 'done',
    actionUrl: config.baseUrl,
    tokens: null,
    acceptButton: null,
    nextPage: null,
    caseTypeIndex: carry.caseTypeIndex ?? 0,
    pageIndex: 0,
    restarts: carry.restarts ?? 0,
  };
}

function acceptPattern(config: PortalSiteConfig): RegExp {
  return new RegExp(config.form.acceptButtonPattern, 'i');
}

function requireTokens(state: NavigatorState, what: string): FormTokens {
  if (!state.tokens) {
    throw new SessionExpiredError(`Form state missing before ${what}`);
  }
  return state.tokens;
}

/** The round trip the current state calls for. */
export function buildRequest(state: NavigatorState, config: PortalSiteConfig): RequestSpec {
  switch (state.phase) {
    case 'landing':
      return { method: 'GET', url: config.baseUrl };

    case 'disclaimer': {
      const tokens = requireTokens(state, 'disclaimer acceptance');
      const fields: Record<string, string> = state.acceptButton
        ? { [state.acceptButton.name]: state.acceptButton.value }
        : {};
      return { method: 'POST', url: state.actionUrl, form: buildPostback(tokens, fields) };
    }

    case 'search': {
      const tokens = requireTokens(state, 'search');
      return {
        method: 'POST',
        url: state.actionUrl,
        form: buildPostback(tokens, {
          [config.form.caseTypeField]: config.caseTypes[state.caseTypeIndex],
          [config.form.searchButtonField]: config.form.searchButtonValue,
        }),
      };
    }

    case 'results': {
      const tokens = requireTokens(state, `results page ${state.pageIndex + 1}`);
      if (!state.nextPage) {
        throw new SessionExpiredError(`Pager postback missing before results page ${state.pageIndex + 1}`);
      }
      return {
        method: 'POST',
        url: state.actionUrl,
        form: buildPostback(tokens, {
          __EVENTTARGET: state.nextPage.target,
          __EVENTARGUMENT: state.nextPage.argument,
        }),
      };
    }

    case 'done':
      throw new Error('Navigator has no request left to make');
  }
}

function assertSessionAlive(html: string, config: PortalSiteConfig): void {
  if (new RegExp(config.form.sessionExpiredPattern, 'i').test(html)) {
    throw new SessionExpiredError('Portal reported the session as expired');
  }
  if (findSubmitButton(html, acceptPattern(config))) {
    throw new SessionExpiredError('Portal bounced back to the disclaimer');
  }
}

function nextFilter(state: NavigatorState, config: PortalSiteConfig): NavigatorState {
  const caseTypeIndex = state.caseTypeIndex + 1;
  if (caseTypeIndex >= config.caseTypes.length) {
    return { ...state, phase: 'done', tokens: null, nextPage: null };
  }
  return initialNavigatorState(config, { caseTypeIndex, restarts: state.restarts });
}

/**
 * Fold one response into the state. Throws SessionExpiredError when the
 * form state was lost and ExtractionError when a results page has no
 * results table.
 */
export function advance(state: NavigatorState, response: TransportResponse, config: PortalSiteConfig): StepResult {
  const html = response.body;

  switch (state.phase) {
    case 'landing': {
      const tokens = extractFormTokens(html);
      if (!tokens) {
        throw new ExtractionError('Portal landing page carries no form state', response.url);
      }
      const acceptButton = findSubmitButton(html, acceptPattern(config));
      return {
        state: {
          ...state,
          phase: acceptButton ? 'disclaimer' : 'search',
          actionUrl: formAction(html, response.url),
          tokens,
          acceptButton,
        },
        page: null,
      };
    }

    case 'disclaimer': {
      if (findSubmitButton(html, acceptPattern(config))) {
        throw new SessionExpiredError('Disclaimer was not accepted');
      }
      const tokens = extractFormTokens(html);
      if (!tokens) {
        throw new SessionExpiredError('Form state missing after disclaimer');
      }
      return {
        state: { ...state, phase: 'search', actionUrl: formAction(html, response.url), tokens, acceptButton: null },
        page: null,
      };
    }

    case 'search':
    case 'results': {
      assertSessionAlive(html, config);

      const pageIndex = state.phase === 'search' ? 1 : state.pageIndex + 1;
      const caseType = config.caseTypes[state.caseTypeIndex];
      const extraction = extractRoster(html, response.url, {
        selectors: config.selectors,
        caseType,
        pageIndex,
        defaultState: config.defaultState,
      });

      const page: RosterPage = {
        caseType,
        pageIndex,
        url: response.url,
        records: extraction.records,
        malformedRows: extraction.malformedRows,
        hasNextPage: extraction.hasNextPage,
        revisited: false,
      };

      if (extraction.hasNextPage && pageIndex < config.maxPages) {
        return {
          state: {
            ...state,
            phase: 'results',
            actionUrl: formAction(html, response.url),
            tokens: extractFormTokens(html),
            nextPage: findPagerPostback(html, pageIndex + 1),
            pageIndex,
          },
          page,
        };
      }

      return { state: nextFilter({ ...state, pageIndex }, config), page };
    }

    case 'done':
      return { state, page: null };
  }
}

/**
 * Drives the roster's WebForms protocol: landing page, disclaimer, search
 * per case-type filter, then pager postbacks. Yields each results page
 * before requesting the next one. A lost session restarts the current
 * filter from page one with cleared cookies, once per run.
 */
export class FormNavigator {
  private current: NavigatorState;

  constructor(
    private readonly transport: Transport,
    private readonly session: SessionContext,
    private readonly config: PortalSiteConfig,
    private readonly fetchOptions: PacedFetchOptions = {}
  ) {
    this.current = initialNavigatorState(config);
  }

  get state(): NavigatorState {
    return this.current;
  }

  async *pages(): AsyncGenerator<RosterPage> {
    this.current = initialNavigatorState(this.config);
    // Highest page index yielded per case-type filter
    const yielded = new Map<number, number>();

    while (this.current.phase !== 'done') {
      const state = this.current;
      let result: StepResult;

      try {
        const response = await pacedFetch(this.transport, this.session, buildRequest(state, this.config), this.fetchOptions);
        result = advance(state, response, this.config);
      } catch (error) {
        if (error instanceof SessionExpiredError && state.restarts < MAX_RESTARTS) {
          await Logger.warning(
            `Session expired (${error.message}); restarting "${this.config.caseTypes[state.caseTypeIndex]}" from page one`,
            'navigator'
          );
          this.session.reset();
          await this.transport.resetSession();
          this.current = initialNavigatorState(this.config, {
            caseTypeIndex: state.caseTypeIndex,
            restarts: state.restarts + 1,
          });
          continue;
        }
        throw error;
      }

      this.current = result.state;
      if (result.page) {
        const highest = yielded.get(state.caseTypeIndex) ?? 0;
        const page: RosterPage = { ...result.page, revisited: result.page.pageIndex <= highest };
        yielded.set(state.caseTypeIndex, Math.max(highest, page.pageIndex));

        await Logger.info(
          `Fetched ${page.caseType} page ${page.pageIndex}: ${page.records.length} rows` +
            (page.malformedRows > 0 ? `, ${page.malformedRows} malformed` : '') +
            (page.revisited ? ' (refetched after restart)' : ''),
          'navigator'
        );
        if (page.hasNextPage && result.state.phase !== 'results') {
          await Logger.warning(`Stopped at the page limit of ${this.config.maxPages}`, 'navigator');
        }
        yield page;
      }
    }
  }
}
