/**
 * Unit Tests for the Scope Registry
 */

import { DOCS_SCOPE, SHEETS_SCOPE } from '../constants/google-api';
import { UnknownAgentError } from './errors';
import { ScopeRegistry } from './scope-registry';

describe('ScopeRegistry', () => {
  describe('with the default table', () => {
    const registry = new ScopeRegistry();

    it('should register the Workspace agents', () => {
      expect(registry.agents()).toEqual(['sheets', 'docs', 'drive', 'slides', 'calendar', 'chat']);
    });

    it('should map an agent to its Google scope', () => {
      expect(registry.scopesFor('sheets')).toEqual(['https://www.googleapis.com/auth/spreadsheets']);
      expect(registry.scopesFor('chat')).toEqual(['https://www.googleapis.com/auth/chat.messages']);
    });

    it('should ignore case and surrounding whitespace in agent names', () => {
      expect(registry.scopesFor(' Docs ')).toEqual([DOCS_SCOPE]);
      expect(registry.has('SHEETS')).toBe(true);
    });

    it('should merge scopes for a combined consent request', () => {
      expect(registry.mergedScopes('sheets', 'docs', 'sheets')).toEqual([DOCS_SCOPE, SHEETS_SCOPE]);
    });

    it('should throw UnknownAgentError for unregistered agents', () => {
      expect(() => registry.scopesFor('gmail')).toThrow(UnknownAgentError);
      expect(() => registry.mergedScopes('sheets', 'gmail')).toThrow('Unknown agent: gmail');
      expect(registry.has('gmail')).toBe(false);
    });

    it('should expose the agent name on the error', () => {
      try {
        registry.scopesFor('gmail');
        throw new Error('expected UnknownAgentError');
      } catch (error) {
        expect(error).toBeInstanceOf(UnknownAgentError);
        expect(error).toMatchObject({ agentName: 'gmail', statusCode: 404, code: 'UNKNOWN_AGENT' });
      }
    });
  });

  describe('with a custom table', () => {
    it('should normalize the declared scopes', () => {
      const registry = new ScopeRegistry({ Reports: ['scope:b', 'scope:a', 'scope:b'] });

      expect(registry.agents()).toEqual(['reports']);
      expect(registry.scopesFor('reports')).toEqual(['scope:a', 'scope:b']);
    });

    it('should reject an agent without scopes', () => {
      expect(() => new ScopeRegistry({ empty: [] })).toThrow('Agent "empty" must declare at least one scope');
    });
  });
});
