/**
 * Scope-set algebra. A scope set is a sorted, de-duplicated array of
 * scope strings; all helpers return new arrays.
 */

export type AuthorizationScope = string;

export type ScopeSet = readonly AuthorizationScope[];

export function normalizeScopes(scopes: Iterable<AuthorizationScope>): ScopeSet {
  const unique = new Set<string>();
  for (const scope of scopes) {
    const trimmed = scope.trim();
    if (trimmed) unique.add(trimmed);
  }
  return [...unique].sort();
}

export function unionScopes(...sets: Iterable<AuthorizationScope>[]): ScopeSet {
  return normalizeScopes(sets.flatMap((set) => [...set]));
}

export function isSubset(required: Iterable<AuthorizationScope>, granted: Iterable<AuthorizationScope>): boolean {
  return missingScopes(required, granted).length === 0;
}

/**
 * Scopes in `required` that `granted` does not cover
 */
export function missingScopes(required: Iterable<AuthorizationScope>, granted: Iterable<AuthorizationScope>): ScopeSet {
  const grantedSet = new Set(normalizeScopes(granted));
  return normalizeScopes(required).filter((scope) => !grantedSet.has(scope));
}

/**
 * Parse the space-delimited `scope` field of a token response
 */
export function parseScopeString(value: string | null | undefined): ScopeSet {
  if (!value) return [];
  return normalizeScopes(value.split(/\s+/));
}

export function formatScopes(scopes: ScopeSet): string {
  return scopes.join(' ');
}
