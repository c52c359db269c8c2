import type { FieldPermission, KeyKind, KeyRecord } from './types';

const DAY_MS = 24 * 60 * 60 * 1000;

export function isKeyKind(value: unknown): value is KeyKind {
  return value === 'endpoint' || value === 'query';
}

export function keyExpiresAt(record: Pick<KeyRecord, 'createdAt' | 'expiresInDays'>): Date {
  return new Date(Date.parse(record.createdAt) + record.expiresInDays * DAY_MS);
}

// The expiry instant itself still authorizes.
export function isKeyExpired(
  record: Pick<KeyRecord, 'createdAt' | 'expiresInDays'>,
  now: number = Date.now(),
): boolean {
  return now > keyExpiresAt(record).getTime();
}

export function keyIndexMember(kind: KeyKind, id: number): string {
  return `${kind}:${id}`;
}

export function parseKeyIndexMember(member: string): { kind: KeyKind; id: number } | null {
  const [kind, rawId] = member.split(':');
  const id = Number(rawId);
  if (!isKeyKind(kind) || !Number.isSafeInteger(id) || id < 0) {
    return null;
  }

  return { kind, id };
}

export function parseKeyRecord(raw: string): KeyRecord | null {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return null;
  }

  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return null;
  }

  const candidate: Record<string, unknown> = { ...value };
  const { id, ownerId, name, createdAt, expiresInDays, accessTenant } = candidate;
  if (
    typeof id !== 'number' ||
    !Number.isSafeInteger(id) ||
    typeof ownerId !== 'string' ||
    typeof name !== 'string' ||
    typeof createdAt !== 'string' ||
    Number.isNaN(Date.parse(createdAt)) ||
    typeof expiresInDays !== 'number' ||
    typeof accessTenant !== 'string'
  ) {
    return null;
  }

  const base = { id, ownerId, name, createdAt, expiresInDays, accessTenant };

  if (candidate.kind === 'endpoint') {
    const endpoints = parseStringList(candidate.endpoints);
    return endpoints ? { ...base, kind: 'endpoint', endpoints } : null;
  }

  if (candidate.kind === 'query') {
    const permissions = parsePermissions(candidate.permissions);
    return permissions ? { ...base, kind: 'query', permissions } : null;
  }

  return null;
}

function parseStringList(value: unknown): string[] | null {
  if (!Array.isArray(value)) {
    return null;
  }

  const items: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') {
      return null;
    }
    items.push(item);
  }
  return items;
}

function parsePermissions(value: unknown): FieldPermission[] | null {
  if (!Array.isArray(value)) {
    return null;
  }

  const permissions: FieldPermission[] = [];
  for (const item of value) {
    if (typeof item !== 'object' || item === null) {
      return null;
    }
    const entry: Record<string, unknown> = { ...item };
    const allowedFields = parseStringList(entry.allowedFields);
    if (typeof entry.operationName !== 'string' || !allowedFields) {
      return null;
    }
    permissions.push({ operationName: entry.operationName, allowedFields });
  }
  return permissions;
}
