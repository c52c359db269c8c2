/**
 * Structural reader for GraphQL documents. It never executes anything; it only
 * reports which root fields ("operations") a document asks for and which
 * fields each of them selects. Only first-level fields are authorized;
 * deeper selections are kept in the tree for diagnostics.
 */

export type QueryField = {
  name: string;
  fields: QueryField[];
};

export type QueryFieldMap = Map<string, string[]>;

type Token =
  | { kind: 'punct'; value: string }
  | { kind: 'name'; value: string }
  | { kind: 'value' };

type Selection =
  | { kind: 'field'; name: string; selections: Selection[] }
  | { kind: 'spread'; fragment: string }
  | { kind: 'inline'; selections: Selection[] };

type ParsedDocument = {
  operations: Selection[][];
  fragments: Map<string, Selection[]>;
};

type ResolveState = {
  fragments: Map<string, Selection[]>;
  // Fragment name -> its fields and the number of fields it expands to.
  resolved: Map<string, { fields: QueryField[]; size: number }>;
  visiting: Set<string>;
  budget: number;
};

const MAX_DEPTH = 64;
// Upper bound on fields produced while expanding fragments.
const MAX_RESOLVED_FIELDS = 10_000;
const OPERATION_TYPES = new Set(['query', 'mutation', 'subscription']);
const PUNCTUATORS = new Set(['!', '$', '&', '(', ')', ':', '=', '@', '[', ']', '{', '|', '}']);

class QuerySyntaxError extends Error {}

export function extractQueryFields(document: string): QueryFieldMap {
  const roots = parseQueryDocument(document);
  const result: QueryFieldMap = new Map();
  if (!roots) {
    return result;
  }

  for (const root of roots) {
    result.set(
      root.name,
      root.fields.map((field) => field.name),
    );
  }
  return result;
}

/** Root fields of every operation, merged by name. `null` when malformed. */
export function parseQueryDocument(document: string): QueryField[] | null {
  try {
    const parsed = new Parser(tokenize(document)).parseDocument();
    const state: ResolveState = {
      fragments: parsed.fragments,
      resolved: new Map(),
      visiting: new Set(),
      budget: MAX_RESOLVED_FIELDS,
    };
    const fields: QueryField[] = [];
    for (const selections of parsed.operations) {
      fields.push(...resolveSelections(selections, state, 0));
    }
    return mergeFields(fields);
  } catch {
    return null;
  }
}

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let index = source.charCodeAt(0) === 0xfeff ? 1 : 0;

  while (index < source.length) {
    const char = source[index];

    if (char === ' ' || char === '\t' || char === '\n' || char === '\r' || char === ',') {
      index += 1;
      continue;
    }

    if (char === '#') {
      while (index < source.length && source[index] !== '\n' && source[index] !== '\r') {
        index += 1;
      }
      continue;
    }

    if (source.startsWith('...', index)) {
      tokens.push({ kind: 'punct', value: '...' });
      index += 3;
      continue;
    }

    if (PUNCTUATORS.has(char)) {
      tokens.push({ kind: 'punct', value: char });
      index += 1;
      continue;
    }

    if (/[_A-Za-z]/.test(char)) {
      const start = index;
      while (index < source.length && /[_0-9A-Za-z]/.test(source[index])) {
        index += 1;
      }
      tokens.push({ kind: 'name', value: source.slice(start, index) });
      continue;
    }

    if (char === '-' || /[0-9]/.test(char)) {
      const match = /^-?\d+(\.\d+)?([eE][+-]?\d+)?/.exec(source.slice(index));
      if (!match) {
        throw new QuerySyntaxError(`Invalid number at ${index}`);
      }
      tokens.push({ kind: 'value' });
      index += match[0].length;
      continue;
    }

    if (source.startsWith('"""', index)) {
      const end = findBlockStringEnd(source, index + 3);
      tokens.push({ kind: 'value' });
      index = end + 3;
      continue;
    }

    if (char === '"') {
      index = skipString(source, index + 1);
      tokens.push({ kind: 'value' });
      continue;
    }

    throw new QuerySyntaxError(`Unexpected character at ${index}`);
  }

  return tokens;
}

function findBlockStringEnd(source: string, from: number): number {
  let index = from;
  while (index < source.length) {
    if (source.startsWith('\\"""', index)) {
      index += 4;
      continue;
    }
    if (source.startsWith('"""', index)) {
      return index;
    }
    index += 1;
  }
  throw new QuerySyntaxError('Unterminated block string');
}

function skipString(source: string, from: number): number {
  let index = from;
  while (index < source.length) {
    const char = source[index];
    if (char === '\\') {
      index += 2;
      continue;
    }
    if (char === '"') {
      return index + 1;
    }
    if (char === '\n' || char === '\r') {
      break;
    }
    index += 1;
  }
  throw new QuerySyntaxError('Unterminated string');
}

class Parser {
  private position = 0;

  constructor(private readonly tokens: Token[]) {}

  parseDocument(): ParsedDocument {
    const operations: Selection[][] = [];
    const fragments = new Map<string, Selection[]>();

    if (this.tokens.length === 0) {
      throw new QuerySyntaxError('Empty document');
    }

    while (!this.atEnd()) {
      if (this.peekPunct('{')) {
        operations.push(this.parseSelectionSet(0));
        continue;
      }

      const keyword = this.expectName();
      if (OPERATION_TYPES.has(keyword)) {
        if (this.peekName()) {
          this.expectName();
        }
        if (this.peekPunct('(')) {
          this.parseVariableDefinitions();
        }
        this.parseDirectives();
        operations.push(this.parseSelectionSet(0));
        continue;
      }

      if (keyword === 'fragment') {
        const name = this.expectName();
        if (name === 'on' || fragments.has(name)) {
          throw new QuerySyntaxError(`Invalid fragment name: ${name}`);
        }
        this.expectKeyword('on');
        this.expectName();
        this.parseDirectives();
        fragments.set(name, this.parseSelectionSet(0));
        continue;
      }

      throw new QuerySyntaxError(`Unexpected definition: ${keyword}`);
    }

    return { operations, fragments };
  }

  private parseSelectionSet(depth: number): Selection[] {
    if (depth > MAX_DEPTH) {
      throw new QuerySyntaxError('Selection set nested too deeply');
    }

    this.expectPunct('{');
    const selections: Selection[] = [];
    while (!this.peekPunct('}')) {
      selections.push(this.parseSelection(depth));
    }
    this.expectPunct('}');

    if (selections.length === 0) {
      throw new QuerySyntaxError('Empty selection set');
    }
    return selections;
  }

  private parseSelection(depth: number): Selection {
    if (this.peekPunct('...')) {
      this.position += 1;
      const next = this.peek();
      if (next?.kind === 'name' && next.value !== 'on') {
        this.position += 1;
        this.parseDirectives();
        return { kind: 'spread', fragment: next.value };
      }
      if (next?.kind === 'name') {
        this.position += 1;
        this.expectName();
      }
      this.parseDirectives();
      return { kind: 'inline', selections: this.parseSelectionSet(depth + 1) };
    }

    let name = this.expectName();
    if (this.peekPunct(':')) {
      this.position += 1;
      name = this.expectName();
    }
    if (this.peekPunct('(')) {
      this.parseArguments();
    }
    this.parseDirectives();
    const selections = this.peekPunct('{') ? this.parseSelectionSet(depth + 1) : [];

    return { kind: 'field', name, selections };
  }

  private parseArguments(): void {
    this.expectPunct('(');
    do {
      this.expectName();
      this.expectPunct(':');
      this.parseValue(0);
    } while (!this.peekPunct(')'));
    this.expectPunct(')');
  }

  private parseVariableDefinitions(): void {
    this.expectPunct('(');
    do {
      this.expectPunct('$');
      this.expectName();
      this.expectPunct(':');
      this.parseType(0);
      if (this.peekPunct('=')) {
        this.position += 1;
        this.parseValue(0);
      }
      this.parseDirectives();
    } while (!this.peekPunct(')'));
    this.expectPunct(')');
  }

  private parseType(depth: number): void {
    if (depth > MAX_DEPTH) {
      throw new QuerySyntaxError('Type nested too deeply');
    }
    if (this.peekPunct('[')) {
      this.position += 1;
      this.parseType(depth + 1);
      this.expectPunct(']');
    } else {
      this.expectName();
    }
    if (this.peekPunct('!')) {
      this.position += 1;
    }
  }

  private parseDirectives(): void {
    while (this.peekPunct('@')) {
      this.position += 1;
      this.expectName();
      if (this.peekPunct('(')) {
        this.parseArguments();
      }
    }
  }

  private parseValue(depth: number): void {
    if (depth > MAX_DEPTH) {
      throw new QuerySyntaxError('Value nested too deeply');
    }

    const token = this.next();
    if (token.kind === 'value' || token.kind === 'name') {
      return;
    }

    switch (token.value) {
      case '$':
        this.expectName();
        return;
      case '[':
        while (!this.peekPunct(']')) {
          this.parseValue(depth + 1);
        }
        this.position += 1;
        return;
      case '{':
        while (!this.peekPunct('}')) {
          this.expectName();
          this.expectPunct(':');
          this.parseValue(depth + 1);
        }
        this.position += 1;
        return;
      default:
        throw new QuerySyntaxError(`Unexpected ${token.value} in value`);
    }
  }

  private atEnd(): boolean {
    return this.position >= this.tokens.length;
  }

  private peek(): Token | undefined {
    return this.tokens[this.position];
  }

  private next(): Token {
    const token = this.peek();
    if (!token) {
      throw new QuerySyntaxError('Unexpected end of document');
    }
    this.position += 1;
    return token;
  }

  private peekPunct(value: string): boolean {
    const token = this.peek();
    return token?.kind === 'punct' && token.value === value;
  }

  private peekName(): boolean {
    return this.peek()?.kind === 'name';
  }

  private expectPunct(value: string): void {
    const token = this.next();
    if (token.kind !== 'punct' || token.value !== value) {
      throw new QuerySyntaxError(`Expected ${value}`);
    }
  }

  private expectName(): string {
    const token = this.next();
    if (token.kind !== 'name') {
      throw new QuerySyntaxError('Expected a name');
    }
    return token.value;
  }

  private expectKeyword(keyword: string): void {
    if (this.expectName() !== keyword) {
      throw new QuerySyntaxError(`Expected ${keyword}`);
    }
  }
}

function resolveSelections(
  selections: Selection[],
  state: ResolveState,
  depth: number,
): QueryField[] {
  if (depth > MAX_DEPTH) {
    throw new QuerySyntaxError('Fragments nested too deeply');
  }

  const fields: QueryField[] = [];
  for (const selection of selections) {
    if (selection.kind === 'field') {
      const nested = resolveSelections(selection.selections, state, depth + 1);
      consume(state, 1);
      fields.push({ name: selection.name, fields: nested });
      continue;
    }

    if (selection.kind === 'inline') {
      fields.push(...resolveSelections(selection.selections, state, depth + 1));
      continue;
    }

    fields.push(...resolveFragment(selection.fragment, state, depth));
  }

  return mergeFields(fields);
}

// Each fragment is expanded once per document. Later spreads reuse the result
// but still pay its full size against the budget.
function resolveFragment(name: string, state: ResolveState, depth: number): QueryField[] {
  const cached = state.resolved.get(name);
  if (cached) {
    consume(state, cached.size);
    return cached.fields;
  }

  const fragment = state.fragments.get(name);
  if (!fragment || state.visiting.has(name)) {
    throw new QuerySyntaxError(`Unresolvable fragment: ${name}`);
  }
  const budgetBefore = state.budget;
  state.visiting.add(name);
  const fields = resolveSelections(fragment, state, depth + 1);
  state.visiting.delete(name);
  state.resolved.set(name, { fields, size: budgetBefore - state.budget });
  return fields;
}

function consume(state: ResolveState, count: number): void {
  state.budget -= count;
  if (state.budget < 0) {
    throw new QuerySyntaxError('Document selects too many fields');
  }
}

function mergeFields(fields: QueryField[]): QueryField[] {
  const merged = new Map<string, QueryField>();
  for (const field of fields) {
    const existing = merged.get(field.name);
    if (existing) {
      existing.fields = mergeFields([...existing.fields, ...field.fields]);
      continue;
    }
    merged.set(field.name, { name: field.name, fields: field.fields });
  }
  return [...merged.values()];
}
