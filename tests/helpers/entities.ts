import type { NavigationEntry } from '../../src/domain/entities/NavigationEntry.js';
import type { Command } from '../../src/domain/commands/Command.js';
import type { DecodeOutcome } from '../../src/domain/commands/DecodeOutcome.js';
import { PageTransition } from '../../src/domain/value-objects/PageTransition.js';

export function navigation(index: number, url: string, overrides: Partial<NavigationEntry> = {}): NavigationEntry {
  return {
    index,
    url,
    title: null,
    referrer: null,
    transitionType: PageTransition.fromRaw(0),
    timestamp: null,
    isOverwrite: false,
    typeMask: 0,
    hasPostData: false,
    originalRequestUrl: null,
    isOverridingUserAgent: false,
    searchTerms: null,
    httpStatusCode: 0,
    referrerPolicy: -1,
    pageStateSize: 0,
    pageState: null,
    pageStateError: null,
    ...overrides,
  };
}

export function commandOutcome(command: Command, commandId = 0): DecodeOutcome {
  return { kind: 'command', commandId, command };
}

export function updateNav(tabId: number, index: number, url: string, overrides: Partial<NavigationEntry> = {}): DecodeOutcome {
  return commandOutcome({ kind: 'UpdateTabNavigation', tabId, entry: navigation(index, url, overrides) }, 6);
}

export function malformed(commandId: number | null = 6): DecodeOutcome {
  return { kind: 'malformed', commandId, cause: { code: 'TruncatedData', offset: 0, detail: 'test' } };
}
