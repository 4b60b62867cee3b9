import { createHash } from 'crypto';
import { MalformedInputError } from '../services/base/ServiceError';
import type { QueryParameters } from '../shared/types';

function isPlainObject(value: object): boolean {
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'object') {
    return value.constructor?.name ?? 'object';
  }
  return typeof value;
}

function canonicalize(value: unknown, path: string, ancestors: Set<object>): string {
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return JSON.stringify(value);
    case 'number':
      if (!Number.isFinite(value)) {
        throw new MalformedInputError(`Parameter '${path}' is not a finite number`, { path });
      }
      return JSON.stringify(value);
    case 'object': {
      if (value === null) {
        return 'null';
      }
      if (ancestors.has(value)) {
        throw new MalformedInputError(`Parameter '${path}' contains a circular reference`, { path });
      }
      ancestors.add(value);
      try {
        if (Array.isArray(value)) {
          const items = value.map((item, index) => canonicalize(item, `${path}[${index}]`, ancestors));
          return `[${items.join(',')}]`;
        }
        if (!isPlainObject(value)) {
          throw new MalformedInputError(`Parameter '${path}' is a ${describe(value)}, not a plain object`, { path });
        }
        const entries = Object.keys(value)
          .sort()
          .map((key) => {
            const child: unknown = Reflect.get(value, key);
            return `${JSON.stringify(key)}:${canonicalize(child, path ? `${path}.${key}` : key, ancestors)}`;
          });
        return `{${entries.join(',')}}`;
      } finally {
        ancestors.delete(value);
      }
    }
    default:
      throw new MalformedInputError(`Parameter '${path || '<root>'}' has unsupported type ${describe(value)}`, { path });
  }
}

/**
 * Serializes a parameter set to JSON with keys sorted at every level, so
 * equal sets produce the same string whatever their insertion order.
 * @throws MalformedInputError for values JSON cannot represent faithfully.
 */
export function canonicalJson(parameters: unknown): string {
  return canonicalize(parameters, '', new Set());
}

/**
 * Deterministic cache key for (subject, query kind, parameters).
 * The three parts are hashed as one JSON array, so no choice of subject
 * or kind text can make two distinct keys encode the same way.
 */
export function fingerprint(subject: string, queryKind: string, parameters: QueryParameters = {}): string {
  const encoded = `[${JSON.stringify(subject)},${JSON.stringify(queryKind)},${canonicalJson(parameters)}]`;
  return createHash('md5').update(encoded).digest('hex');
}

/**
 * Digest of raw document bytes used for deduplication.
 */
export function contentHash(content: Buffer | Uint8Array): string {
  return createHash('md5').update(content).digest('hex');
}
