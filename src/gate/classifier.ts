export type ActionPredicate = (payload: string) => boolean;

export const DEFAULT_NAVIGATIONAL_PREFIXES = ['menu_', 'back_', 'explore_', 'page_'];
export const DEFAULT_NAVIGATIONAL_ACTIONS = ['status', 'help', 'subscribe', 'unsubscribe', '/start', '/help', '/status'];

export interface ClassifierRules {
  prefixes: readonly string[];
  actions: readonly string[];
}

/**
 * Builds the navigational predicate from prefix and literal lists.
 * Matching is exact and case-sensitive; surrounding whitespace is ignored.
 */
export function createActionClassifier(rules: ClassifierRules): ActionPredicate {
  const prefixes = rules.prefixes.map((prefix) => prefix.trim()).filter((prefix) => prefix.length > 0);
  const actions = new Set(rules.actions.map((action) => action.trim()).filter((action) => action.length > 0));

  return (payload: string) => {
    const normalized = payload.trim();
    if (normalized.length === 0) return false;
    if (actions.has(normalized)) return true;
    return prefixes.some((prefix) => normalized.startsWith(prefix));
  };
}
