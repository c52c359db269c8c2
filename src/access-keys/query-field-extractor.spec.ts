import { extractQueryFields, parseQueryDocument } from './query-field-extractor';

const asObject = (document: string) => Object.fromEntries(extractQueryFields(document));

// F0 spreads F1 twice, F1 spreads F2 twice, and so on down to a single field.
const fragmentChain = (levels: number, operation: string): string => {
  const fragments = Array.from(
    { length: levels },
    (_, index) => `fragment F${index} on T { ...F${index + 1} ...F${index + 1} }`,
  );
  return `${operation} ${fragments.join(' ')} fragment F${levels} on T { id }`;
};

describe('extractQueryFields', () => {
  it('maps each root field to its first-level fields', () => {
    expect(asObject('{ users { id name } }')).toEqual({ users: ['id', 'name'] });
  });

  it('reads named operations with variables and arguments', () => {
    const document = `
      query FindUser($id: ID!, $first: Int = 10) {
        user(id: $id) { id email }
        posts(first: $first) { title }
      }
    `;

    expect(asObject(document)).toEqual({ user: ['id', 'email'], posts: ['title'] });
  });

  it('reads mutations', () => {
    expect(asObject('mutation { createUser(name: "x") { id } }')).toEqual({ createUser: ['id'] });
  });

  it('uses field names, not aliases', () => {
    expect(asObject('{ u: user { n: name } }')).toEqual({ user: ['name'] });
  });

  it('merges repeated root fields without duplicates', () => {
    expect(asObject('{ users { id } users { name id } posts { title } }')).toEqual({
      users: ['id', 'name'],
      posts: ['title'],
    });
  });

  it('resolves named fragments', () => {
    const document = `
      query { ...Root }
      fragment Root on Query { users { ...UserFields } }
      fragment UserFields on User { id email }
    `;

    expect(asObject(document)).toEqual({ users: ['id', 'email'] });
  });

  it('flattens inline fragments', () => {
    const document = '{ search { ... on User { name } ... on Post { title } } }';

    expect(asObject(document)).toEqual({ search: ['name', 'title'] });
  });

  it('skips directives and complex argument values', () => {
    const document = `
      # leading comment
      {
        users(filter: { role: "admin", ids: [1, 2] }, note: """multi
        line""") @include(if: true) {
          id @skip(if: false),
        }
      }
    `;

    expect(asObject(document)).toEqual({ users: ['id'] });
  });

  it('reads every operation in a multi-operation document', () => {
    const document = 'query A { users { id } } query B { posts { title } }';

    expect(asObject(document)).toEqual({ users: ['id'], posts: ['title'] });
  });

  it('merges a root field shared by several operations', () => {
    const document = 'query A { users { id } } query B { users { email id } }';

    expect(asObject(document)).toEqual({ users: ['id', 'email'] });
  });

  it('reuses a fragment spread many times', () => {
    expect(asObject(fragmentChain(5, '{ users { ...F0 } }'))).toEqual({ users: ['id'] });
  });

  it('gives up quickly on fragments that expand exponentially', () => {
    const started = Date.now();

    expect(extractQueryFields(fragmentChain(40, '{ users { ...F0 } }')).size).toBe(0);
    expect(Date.now() - started).toBeLessThan(1000);
  });

  it('gives up on fragments that fan out into nested fields', () => {
    const levels = Array.from(
      { length: 30 },
      (_, index) => `fragment F${index} on T { a { ...F${index + 1} } b { ...F${index + 1} } }`,
    );
    const document = `{ x { ...F0 } x { ...F0 } } ${levels.join(' ')} fragment F30 on T { id }`;

    expect(extractQueryFields(document).size).toBe(0);
  });

  it('keeps leaf root fields with no selections', () => {
    expect(asObject('{ __typename }')).toEqual({ __typename: [] });
  });

  it('reports only first-level fields', () => {
    expect(asObject('{ users { posts { title } } }')).toEqual({ users: ['posts'] });
  });

  it.each([
    ['an empty document', ''],
    ['an unbalanced document', '{ users { id }'],
    ['an empty selection set', 'mutation { }'],
    ['an unknown fragment', '{ users { ...Missing } }'],
    ['cyclic fragments', '{ u { ...A } } fragment A on User { ...B } fragment B on User { ...A }'],
    ['an unterminated string', '{ users(name: "x) { id } }'],
    ['an unexpected character', '{ users { id % } }'],
    ['nesting beyond the depth limit', `${'{ a '.repeat(70)}${'}'.repeat(70)}`],
  ])('returns an empty map for %s', (_label, document) => {
    expect(extractQueryFields(document).size).toBe(0);
  });
});

describe('parseQueryDocument', () => {
  it('keeps the nested selection tree', () => {
    expect(parseQueryDocument('{ users { posts { title } } }')).toEqual([
      { name: 'users', fields: [{ name: 'posts', fields: [{ name: 'title', fields: [] }] }] },
    ]);
  });

  it('returns null for malformed documents', () => {
    expect(parseQueryDocument('{')).toBeNull();
  });
});
