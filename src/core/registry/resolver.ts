/**
 * Dependency identifier resolution strategies.
 *
 * The graph builder is handed one of these; swapping the policy never touches
 * graph, cycle or metric code.
 */
import { normalizeIdentifier } from './normalize.js';
import type { DependencyResolver, ModuleLookup } from './types.js';

/**
 * Matches identifiers that equal a registered identity.
 */
export const exactResolver: DependencyResolver = {
  name: 'exact',
  resolve(identifier: string, registry: ModuleLookup): string | null {
    return registry.has(identifier) ? identifier : null;
  },
};

/**
 * Matches on the normalized key (case, path prefix, extension and `Module`
 * suffix ignored). Ambiguous keys resolve to nothing.
 */
export const normalizedResolver: DependencyResolver = {
  name: 'normalized',
  resolve(identifier: string, registry: ModuleLookup): string | null {
    const key = normalizeIdentifier(identifier);
    if (key.length === 0) return null;

    const candidates = registry.findByNormalizedKey(key);
    return candidates.length === 1 ? candidates[0] : null;
  },
};

/**
 * Try each resolver in order and take the first hit.
 */
export function chainResolvers(...resolvers: DependencyResolver[]): DependencyResolver {
  return {
    name: resolvers.map((r) => r.name).join('+'),
    resolve(identifier: string, registry: ModuleLookup): string | null {
      for (const resolver of resolvers) {
        const resolved = resolver.resolve(identifier, registry);
        if (resolved !== null) {
          return resolved;
        }
      }
      return null;
    },
  };
}

/** Exact match, then normalized match. */
export const defaultResolver: DependencyResolver = chainResolvers(exactResolver, normalizedResolver);
