import { stringValue, XmlElement } from './xml-document';

/**
 * A small, declarative subset of XPath 1.0 used by the dialect tables.
 *
 *   cac:AccountingSupplierParty/cac:Party/cbc:EndpointID
 *   cfdi:Emisor/@Rfc
 *   //tfd:TimbreFiscalDigital/@UUID
 *   cac:TaxTotal[1]/cbc:TaxAmount
 *   cfdi:Traslado[@Impuesto='002']/@Importe | cfdi:Traslado[@Impuesto='2']/@Importe
 *
 * Paths are always relative to a context element. Unprefixed names match
 * elements in no namespace; a prefix may be bound to several namespace URIs.
 */

/** prefix -> namespace URIs the prefix stands for */
export type NamespaceBindings = Readonly<Record<string, readonly string[]>>;

interface NameTest {
  /** undefined matches any local name */
  readonly localName?: string;
  readonly namespaces: readonly string[] | 'any' | 'none';
}

type Predicate =
  | { readonly kind: 'position'; readonly position: number }
  | { readonly kind: 'attribute'; readonly test: NameTest; readonly value?: string }
  | { readonly kind: 'child'; readonly test: NameTest; readonly value?: string };

interface Step {
  readonly axis: 'child' | 'descendant' | 'self';
  readonly test: NameTest;
  readonly predicates: readonly Predicate[];
}

interface LocationPath {
  readonly steps: readonly Step[];
  readonly attribute?: NameTest;
}

export interface CompiledPath {
  readonly source: string;
  readonly alternatives: readonly LocationPath[];
  /** true when every alternative ends in an element rather than an attribute */
  readonly selectsElements: boolean;
}

export class PathSyntaxError extends Error {
  constructor(
    public readonly source: string,
    reason: string,
    public readonly position: number,
  ) {
    super(`Invalid path expression "${source}": ${reason} at position ${position}`);
    this.name = 'PathSyntaxError';
  }
}

const ANY_ELEMENT: NameTest = { namespaces: 'any' };
const ELEMENT_ITSELF = -1;
const NAME = /[A-Za-z_][A-Za-z0-9_.-]*/y;
const DIGITS = /[0-9]+/y;

export function compilePath(source: string, bindings: NamespaceBindings): CompiledPath {
  return new PathParser(source, bindings).parse();
}

/** Elements selected by a path that does not end in an attribute step, in document order. */
export function selectElements(context: XmlElement, path: CompiledPath): XmlElement[] {
  const selected = new Set<XmlElement>();
  for (const alternative of path.alternatives) {
    if (alternative.attribute) {
      continue;
    }
    for (const element of walk(context, alternative.steps)) {
      selected.add(element);
    }
  }
  return inDocumentOrder(context, selected);
}

/**
 * String values of the selected elements or attributes. Like an XPath
 * node-set, each node appears once and the union of alternatives is in
 * document order.
 */
export function selectValues(context: XmlElement, path: CompiledPath): string[] {
  // element -> ELEMENT_ITSELF and/or indexes of its selected attributes
  const selected = new Map<XmlElement, Set<number>>();
  const mark = (element: XmlElement, index: number): void => {
    const marks = selected.get(element) ?? new Set<number>();
    marks.add(index);
    selected.set(element, marks);
  };

  for (const alternative of path.alternatives) {
    const attributeTest = alternative.attribute;

    for (const element of walk(context, alternative.steps)) {
      if (!attributeTest) {
        mark(element, ELEMENT_ITSELF);
        continue;
      }
      element.attributes.forEach((attribute, index) => {
        if (matchesName(attributeTest, attribute.localName, attribute.namespace)) {
          mark(element, index);
        }
      });
    }
  }

  const values: string[] = [];
  for (const element of inDocumentOrder(context, selected.keys())) {
    const marks = [...(selected.get(element) ?? [])].sort((a, b) => a - b);
    for (const index of marks) {
      values.push(index === ELEMENT_ITSELF ? stringValue(element) : element.attributes[index].value);
    }
  }
  return values;
}

/** Selected nodes all lie in the context's subtree, so a preorder walk of it ranks them. */
function inDocumentOrder(context: XmlElement, elements: Iterable<XmlElement>): XmlElement[] {
  const rank = new Map<XmlElement, number>();
  const visit = (element: XmlElement): void => {
    rank.set(element, rank.size);
    element.children.forEach(visit);
  };
  visit(context);

  return [...elements].sort((a, b) => (rank.get(a) ?? 0) - (rank.get(b) ?? 0));
}

function walk(context: XmlElement, steps: readonly Step[]): XmlElement[] {
  let current: XmlElement[] = [context];

  for (const step of steps) {
    const next = new Set<XmlElement>();
    for (const node of current) {
      let candidates = axisNodes(node, step.axis).filter((candidate) =>
        matchesName(step.test, candidate.localName, candidate.namespace),
      );
      for (const predicate of step.predicates) {
        candidates = applyPredicate(candidates, predicate);
      }
      candidates.forEach((candidate) => next.add(candidate));
    }
    current = [...next];
  }

  return current;
}

function axisNodes(node: XmlElement, axis: Step['axis']): readonly XmlElement[] {
  switch (axis) {
    case 'self':
      return [node];
    case 'child':
      return node.children;
    case 'descendant': {
      const descendants: XmlElement[] = [];
      const visit = (element: XmlElement): void => {
        for (const child of element.children) {
          descendants.push(child);
          visit(child);
        }
      };
      visit(node);
      return descendants;
    }
  }
}

function applyPredicate(candidates: XmlElement[], predicate: Predicate): XmlElement[] {
  switch (predicate.kind) {
    case 'position': {
      const match = candidates[predicate.position - 1];
      return match ? [match] : [];
    }
    case 'attribute':
      return candidates.filter((candidate) =>
        candidate.attributes.some(
          (attribute) =>
            matchesName(predicate.test, attribute.localName, attribute.namespace) &&
            (predicate.value === undefined || attribute.value === predicate.value),
        ),
      );
    case 'child':
      return candidates.filter((candidate) =>
        candidate.children.some(
          (child) =>
            matchesName(predicate.test, child.localName, child.namespace) &&
            (predicate.value === undefined || stringValue(child).trim() === predicate.value),
        ),
      );
  }
}

function matchesName(test: NameTest, localName: string, namespace: string | undefined): boolean {
  if (test.localName !== undefined && test.localName !== localName) {
    return false;
  }
  if (test.namespaces === 'any') {
    return true;
  }
  if (test.namespaces === 'none') {
    return namespace === undefined;
  }
  return namespace !== undefined && test.namespaces.includes(namespace);
}

class PathParser {
  private position = 0;

  constructor(
    private readonly source: string,
    private readonly bindings: NamespaceBindings,
  ) {}

  parse(): CompiledPath {
    const alternatives: LocationPath[] = [this.parseLocationPath()];
    this.skipSpaces();

    while (this.peek() === '|') {
      this.position++;
      alternatives.push(this.parseLocationPath());
      this.skipSpaces();
    }

    if (this.position < this.source.length) {
      throw this.error(`unexpected '${this.peek()}'`);
    }

    return {
      source: this.source,
      alternatives,
      selectsElements: alternatives.every((alternative) => alternative.attribute === undefined),
    };
  }

  private parseLocationPath(): LocationPath {
    this.skipSpaces();
    const steps: Step[] = [];
    let axis: 'child' | 'descendant' = 'child';

    if (this.source.startsWith('//', this.position)) {
      axis = 'descendant';
      this.position += 2;
    } else if (this.peek() === '/') {
      throw this.error('absolute paths are not supported');
    }

    for (;;) {
      if (this.peek() === '@') {
        if (axis === 'descendant') {
          throw this.error('an attribute step cannot follow //');
        }
        this.position++;
        return { steps, attribute: this.parseNameTest() };
      }

      steps.push(this.parseStep(axis));

      if (this.source.startsWith('//', this.position)) {
        axis = 'descendant';
        this.position += 2;
      } else if (this.peek() === '/') {
        axis = 'child';
        this.position++;
      } else {
        return { steps };
      }
    }
  }

  private parseStep(axis: 'child' | 'descendant'): Step {
    if (this.peek() === '.') {
      this.position++;
      return { axis: 'self', test: ANY_ELEMENT, predicates: [] };
    }

    const test = this.parseNameTest();
    const predicates: Predicate[] = [];
    while (this.peek() === '[') {
      predicates.push(this.parsePredicate());
    }
    return { axis, test, predicates };
  }

  private parseNameTest(): NameTest {
    if (this.peek() === '*') {
      this.position++;
      return ANY_ELEMENT;
    }

    const name = this.readName();
    if (this.peek() !== ':') {
      return { localName: name, namespaces: 'none' };
    }

    this.position++;
    const namespaces = this.bindings[name];
    if (!namespaces || namespaces.length === 0) {
      throw this.error(`namespace prefix '${name}' is not bound`);
    }

    if (this.peek() === '*') {
      this.position++;
      return { namespaces };
    }
    return { localName: this.readName(), namespaces };
  }

  private parsePredicate(): Predicate {
    this.position++;
    this.skipSpaces();

    let predicate: Predicate;
    DIGITS.lastIndex = this.position;
    const digits = DIGITS.exec(this.source);

    if (digits) {
      this.position += digits[0].length;
      const position = Number(digits[0]);
      if (position < 1) {
        throw this.error('positions start at 1');
      }
      predicate = { kind: 'position', position };
    } else if (this.peek() === '@') {
      this.position++;
      const test = this.parseNameTest();
      predicate = { kind: 'attribute', test, value: this.parseOptionalValue() };
    } else {
      const test = this.parseNameTest();
      predicate = { kind: 'child', test, value: this.parseOptionalValue() };
    }

    this.skipSpaces();
    if (this.peek() !== ']') {
      throw this.error("expected ']'");
    }
    this.position++;
    return predicate;
  }

  private parseOptionalValue(): string | undefined {
    this.skipSpaces();
    if (this.peek() !== '=') {
      return undefined;
    }
    this.position++;
    this.skipSpaces();

    const quote = this.peek();
    if (quote !== "'" && quote !== '"') {
      throw this.error('expected a quoted literal');
    }
    const end = this.source.indexOf(quote, this.position + 1);
    if (end === -1) {
      throw this.error('unterminated literal');
    }

    const value = this.source.slice(this.position + 1, end);
    this.position = end + 1;
    return value;
  }

  private readName(): string {
    NAME.lastIndex = this.position;
    const match = NAME.exec(this.source);
    if (!match) {
      throw this.error('expected a name');
    }
    this.position += match[0].length;
    return match[0];
  }

  private skipSpaces(): void {
    while (this.peek() === ' ') {
      this.position++;
    }
  }

  private peek(): string {
    return this.source.charAt(this.position);
  }

  private error(reason: string): PathSyntaxError {
    return new PathSyntaxError(this.source, reason, this.position);
  }
}
