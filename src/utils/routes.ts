/**
 * Route Registry
 *
 * Holds the declared path templates and methods of every route so that a
 * request can be mapped to its template without going through the router,
 * e.g. for metrics on requests the gatekeeper rejected or the router missed.
 *
 * Templates use Fastify's ":param" syntax and a trailing "*" wildcard. When
 * several templates match, the lexically-first one wins so the label is
 * deterministic.
 */

export interface RouteDeclaration {
  method: string;
  template: string;
}

interface CompiledRoute {
  methods: Set<string>;
  template: string;
  segments: string[];
}

function splitPath(path: string): string[] {
  const withoutQuery = path.split('?', 1)[0];
  return withoutQuery.split('/').filter((segment) => segment.length > 0);
}

function segmentMatches(pattern: string, segment: string): boolean {
  return pattern.startsWith(':') ? segment.length > 0 : pattern === segment;
}

function pathMatches(patterns: string[], segments: string[]): boolean {
  const wildcard = patterns.length > 0 && patterns[patterns.length - 1] === '*';
  const fixed = wildcard ? patterns.slice(0, -1) : patterns;
  if (wildcard ? segments.length < fixed.length : segments.length !== fixed.length) return false;
  return fixed.every((pattern, i) => segmentMatches(pattern, segments[i]));
}

export class RouteRegistry {
  private routes = new Map<string, CompiledRoute>();

  register(declaration: RouteDeclaration): void {
    const method = declaration.method.toUpperCase();
    const existing = this.routes.get(declaration.template);
    if (existing) {
      existing.methods.add(method);
      return;
    }
    this.routes.set(declaration.template, {
      methods: new Set([method]),
      template: declaration.template,
      segments: splitPath(declaration.template),
    });
  }

  templates(): string[] {
    return [...this.routes.keys()].sort();
  }

  /** Template the request was headed for, or null if no declared route fits */
  resolve(method: string, path: string): string | null {
    const upper = method.toUpperCase();
    const segments = splitPath(path);

    const candidates: string[] = [];
    for (const route of this.routes.values()) {
      if (!route.methods.has(upper) && !(upper === 'HEAD' && route.methods.has('GET'))) continue;
      if (pathMatches(route.segments, segments)) {
        candidates.push(route.template);
      }
    }

    if (candidates.length === 0) return null;
    candidates.sort();
    return candidates[0];
  }
}
