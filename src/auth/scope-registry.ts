/**
 * Scope Registry
 *
 * Declarative table from agent name to the OAuth scopes that agent needs.
 * Read-only after construction; every agent's scopes come from here, so a
 * combined consent request is a plain union over the table.
 */

import {
  CALENDAR_SCOPE,
  CHAT_SCOPE,
  DOCS_SCOPE,
  DRIVE_SCOPE,
  SHEETS_SCOPE,
  SLIDES_SCOPE,
} from '../constants/google-api';
import { UnknownAgentError } from './errors';
import { normalizeScopes, unionScopes, type AuthorizationScope, type ScopeSet } from './scopes';

export type ScopeTable = Readonly<Record<string, readonly AuthorizationScope[]>>;

/**
 * Scopes for the Workspace agents served by the gateway
 */
export const DEFAULT_SCOPE_TABLE: ScopeTable = {
  sheets: [SHEETS_SCOPE],
  docs: [DOCS_SCOPE],
  drive: [DRIVE_SCOPE],
  slides: [SLIDES_SCOPE],
  calendar: [CALENDAR_SCOPE],
  chat: [CHAT_SCOPE],
};

function normalizeAgentName(name: string): string {
  return name.trim().toLowerCase();
}

export class ScopeRegistry {
  private readonly table: ReadonlyMap<string, ScopeSet>;

  constructor(table: ScopeTable = DEFAULT_SCOPE_TABLE) {
    const entries = new Map<string, ScopeSet>();
    for (const [name, scopes] of Object.entries(table)) {
      const normalized = normalizeScopes(scopes);
      if (normalized.length === 0) {
        throw new Error(`Agent "${name}" must declare at least one scope`);
      }
      entries.set(normalizeAgentName(name), normalized);
    }
    this.table = entries;
  }

  /**
   * @throws UnknownAgentError if the agent is not registered
   */
  scopesFor(agentName: string): ScopeSet {
    const scopes = this.table.get(normalizeAgentName(agentName));
    if (!scopes) {
      throw new UnknownAgentError(agentName);
    }
    return scopes;
  }

  /**
   * Union of the scopes of several agents, for a single consent request
   */
  mergedScopes(...agentNames: string[]): ScopeSet {
    return unionScopes(...agentNames.map((name) => this.scopesFor(name)));
  }

  has(agentName: string): boolean {
    return this.table.has(normalizeAgentName(agentName));
  }

  agents(): string[] {
    return [...this.table.keys()];
  }
}
