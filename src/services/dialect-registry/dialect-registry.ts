import { AppError } from '../../common/errors/app-error';
import { XmlElement } from '../../common/xml/xml-document';
import { Dialect, DialectMatcher, DialectSummary } from '../../models/dialect';
import { IDialectRegistry } from '../../models/service.interfaces';

export const DIALECT_REGISTRY = 'DIALECT_REGISTRY';

/**
 * Immutable, priority-ordered set of dialects.
 *
 * Namespace matchers that also pin the root name are tried first, then
 * namespace-only matchers, then root-name matchers for documents without a
 * namespace. Table order breaks ties.
 */
export class DialectRegistry implements IDialectRegistry {
  private readonly ordered: readonly Dialect[];
  private readonly byId: ReadonlyMap<string, Dialect>;

  constructor(dialects: readonly Dialect[]) {
    const byId = new Map<string, Dialect>();
    for (const dialect of dialects) {
      if (byId.has(dialect.id)) {
        throw AppError.configurationError(`Dialect id '${dialect.id}' is registered twice`);
      }
      byId.set(dialect.id, dialect);
    }

    this.byId = byId;
    // Array.prototype.sort is stable, so table order survives within a class
    this.ordered = Object.freeze(
      [...dialects].sort((a, b) => specificity(b.matcher) - specificity(a.matcher)),
    );
  }

  resolve(root: XmlElement): Dialect | undefined {
    return this.ordered.find((dialect) => matches(dialect.matcher, root));
  }

  get(id: string): Dialect | undefined {
    return this.byId.get(id);
  }

  list(): readonly DialectSummary[] {
    return this.ordered.map(({ id, label }) => ({ id, label }));
  }
}

function specificity(matcher: DialectMatcher): number {
  switch (matcher.kind) {
    case 'namespace':
      return matcher.rootNames ? 3 : 2;
    case 'rootName':
      return 1;
  }
}

function matches(matcher: DialectMatcher, root: XmlElement): boolean {
  switch (matcher.kind) {
    case 'namespace':
      return (
        root.namespace !== undefined &&
        matcher.namespaces.includes(root.namespace) &&
        (!matcher.rootNames || matcher.rootNames.includes(root.localName))
      );
    case 'rootName':
      return root.namespace === undefined && matcher.rootNames.includes(root.localName);
  }
}
