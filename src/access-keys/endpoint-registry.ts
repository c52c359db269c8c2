import { GRAPHQL_PATH } from './access-keys.constants';

export type RegisteredEndpoint = {
  path: string;
  method: 'GET' | 'POST';
  description: string;
  // Field name -> type label, or null when the endpoint takes no body.
  body: Record<string, string> | null;
};

/** Paths an endpoint key can be scoped to. */
export const ENDPOINT_REGISTRY: readonly RegisteredEndpoint[] = [
  {
    path: '/api/whoami',
    method: 'GET',
    description: 'Resolve the tenant serving the presented key',
    body: null,
  },
  {
    path: GRAPHQL_PATH,
    method: 'POST',
    description: 'GraphQL entry point; requires a query key',
    body: { query: 'string', variables: 'object?', operationName: 'string?' },
  },
];
