/**
 * @fileoverview Conversion between neo4j-driver native values and plain values.
 *
 * Both directions are closed tables: every supported kind is listed, and
 * anything else fails instead of being passed along.
 *
 * Host → native:
 * - string, boolean, null pass through; undefined becomes null
 * - safe integral numbers and bigints become driver Integers (Cypher INTEGER),
 *   other numbers stay floats
 * - Date becomes a DateTime; Uint8Array/Int8Array become byte arrays
 * - arrays, plain objects and string-keyed Maps are converted recursively
 * - driver Integers, temporal and spatial values are already native
 *
 * Native → host:
 * - Integers become numbers (or bigints when asked to)
 * - nodes, relationships, paths and points become tagged plain objects
 * - temporal values become ISO-8601 strings
 *
 * @module neo4j-session-kit/neo4j/ValueConverter
 */

import neo4j from 'neo4j-driver';
import type { Integer } from 'neo4j-driver';
import { ConversionError, UnsupportedParameterTypeError } from './errors.js';
import type {
  GraphNode,
  GraphPath,
  GraphPoint,
  GraphRelationship,
  HostMap,
  HostValue,
  QueryParams,
  ResultRecord,
} from './types.js';

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

/** The parts of a driver Record the converter reads. */
export interface RecordLike {
  readonly keys: readonly PropertyKey[];
  get(index: number): unknown;
}

export interface ConversionOptions {
  /**
   * How to represent integers outside the safe JavaScript range.
   * `'number'` (default) rejects them with a ConversionError.
   */
  integers?: 'number' | 'bigint';
}

// ============================================================================
// Host → native
// ============================================================================

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'function') return `function ${value.name || '<anonymous>'}`;
  if (typeof value === 'object') {
    const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
    return typeof ctor === 'function' && ctor.name ? `${ctor.name} instance` : 'object';
  }
  return typeof value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function isNativeTemporalOrSpatial(value: unknown): boolean {
  return (
    neo4j.isDate(value) ||
    neo4j.isDateTime(value) ||
    neo4j.isLocalDateTime(value) ||
    neo4j.isLocalTime(value) ||
    neo4j.isTime(value) ||
    neo4j.isDuration(value) ||
    neo4j.isPoint(value)
  );
}

/** Assigns an own enumerable property; `__proto__` stays an ordinary key. */
function setOwn(target: object, key: string, value: unknown): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

function toNativeMap(entries: Iterable<[string, unknown]>, path: string): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of entries) {
    setOwn(out, key, toNeo4jValue(value, `${path}.${key}`));
  }
  return out;
}

/**
 * Converts one host value into the representation the driver sends.
 * @param path Location of the value, used in error messages.
 */
export function toNeo4jValue(value: unknown, path = '$'): unknown {
  if (value === null || value === undefined) return null;

  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      return Number.isSafeInteger(value) ? neo4j.int(value) : value;
    case 'bigint':
      if (value < INT64_MIN || value > INT64_MAX) {
        throw new UnsupportedParameterTypeError(path, `bigint ${value} outside the 64-bit integer range`);
      }
      return neo4j.int(value);
    case 'object':
      break;
    default:
      throw new UnsupportedParameterTypeError(path, describe(value));
  }

  if (neo4j.isInt(value) || isNativeTemporalOrSpatial(value)) return value;
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new UnsupportedParameterTypeError(path, 'invalid Date');
    }
    return neo4j.types.DateTime.fromStandardDate(value);
  }
  if (value instanceof Int8Array) return value;
  if (value instanceof Uint8Array) {
    return new Int8Array(value.buffer, value.byteOffset, value.byteLength);
  }
  if (Array.isArray(value)) {
    return value.map((item, index) => toNeo4jValue(item, `${path}[${index}]`));
  }
  if (value instanceof Map) {
    const entries: Array<[string, unknown]> = [];
    for (const [key, item] of value) {
      if (typeof key !== 'string') {
        throw new UnsupportedParameterTypeError(`${path}`, `Map key of type ${describe(key)}`);
      }
      entries.push([key, item]);
    }
    return toNativeMap(entries, path);
  }
  if (isPlainObject(value)) {
    return toNativeMap(Object.entries(value), path);
  }

  throw new UnsupportedParameterTypeError(path, describe(value));
}

/**
 * Converts a parameter map before it is handed to the driver. The whole map is
 * converted first, so an unsupported value never reaches the driver.
 */
export function toNeo4jParams(params: QueryParams | undefined): Record<string, unknown> {
  if (params === undefined) return {};
  return toNativeMap(Object.entries(params), '$');
}

// ============================================================================
// Native → host
// ============================================================================

function integerToHost(value: Integer, path: string, options: ConversionOptions): number | bigint {
  if (value.inSafeRange()) return value.toNumber();
  if (options.integers === 'bigint') return value.toBigInt();
  throw new ConversionError(
    `Integer ${value.toString()} at '${path}' is outside the safe number range`,
    { path, value: value.toString() },
  );
}

function numericToHost(value: unknown, path: string, options: ConversionOptions): number {
  if (typeof value === 'number') return value;
  if (neo4j.isInt(value)) return Number(integerToHost(value, path, options));
  throw new ConversionError(`Expected a number at '${path}'`, { path, received: describe(value) });
}

function propertiesToHost(properties: object, path: string, options: ConversionOptions): HostMap {
  const out: HostMap = {};
  for (const [key, value] of Object.entries(properties)) {
    setOwn(out, key, toHostValue(value, `${path}.${key}`, options));
  }
  return out;
}

function nodeToHost(value: unknown, path: string, options: ConversionOptions): GraphNode {
  if (!(value instanceof neo4j.types.Node)) {
    throw new ConversionError(`Expected a node at '${path}'`, { path, received: describe(value) });
  }
  return {
    kind: 'node',
    elementId: value.elementId,
    labels: [...value.labels],
    properties: propertiesToHost(value.properties, `${path}.properties`, options),
  };
}

function relationshipToHost(value: unknown, path: string, options: ConversionOptions): GraphRelationship {
  if (!(value instanceof neo4j.types.Relationship)) {
    throw new ConversionError(`Expected a relationship at '${path}'`, { path, received: describe(value) });
  }
  return {
    kind: 'relationship',
    elementId: value.elementId,
    type: value.type,
    startElementId: value.startNodeElementId,
    endElementId: value.endNodeElementId,
    properties: propertiesToHost(value.properties, `${path}.properties`, options),
  };
}

function pathToHost(value: InstanceType<typeof neo4j.types.Path>, path: string, options: ConversionOptions): GraphPath {
  return {
    kind: 'path',
    start: nodeToHost(value.start, `${path}.start`, options),
    end: nodeToHost(value.end, `${path}.end`, options),
    segments: value.segments.map((segment, index) => ({
      start: nodeToHost(segment.start, `${path}.segments[${index}].start`, options),
      relationship: relationshipToHost(segment.relationship, `${path}.segments[${index}].relationship`, options),
      end: nodeToHost(segment.end, `${path}.segments[${index}].end`, options),
    })),
  };
}

function pointToHost(value: InstanceType<typeof neo4j.types.Point>, path: string, options: ConversionOptions): GraphPoint {
  const point: GraphPoint = {
    kind: 'point',
    srid: numericToHost(value.srid, `${path}.srid`, options),
    x: value.x,
    y: value.y,
  };
  if (value.z !== undefined) point.z = value.z;
  return point;
}

/**
 * Converts one native driver value into a plain host value.
 * @param path Location of the value, used in error messages.
 */
export function toHostValue(value: unknown, path = '$', options: ConversionOptions = {}): HostValue {
  if (value === null || value === undefined) return null;

  switch (typeof value) {
    case 'string':
    case 'boolean':
    case 'number':
      return value;
    case 'object':
      break;
    default:
      throw new ConversionError(`Unsupported native value at '${path}': ${describe(value)}`, {
        path,
        received: describe(value),
      });
  }

  if (neo4j.isInt(value)) return integerToHost(value, path, options);
  if (value instanceof neo4j.types.Node) return nodeToHost(value, path, options);
  if (value instanceof neo4j.types.Relationship) return relationshipToHost(value, path, options);
  if (value instanceof neo4j.types.Path) return pathToHost(value, path, options);
  if (value instanceof neo4j.types.Point) return pointToHost(value, path, options);
  if (
    neo4j.isDate(value) ||
    neo4j.isDateTime(value) ||
    neo4j.isLocalDateTime(value) ||
    neo4j.isLocalTime(value) ||
    neo4j.isTime(value) ||
    neo4j.isDuration(value)
  ) {
    return value.toString();
  }
  if (value instanceof Int8Array || value instanceof Uint8Array) {
    return new Uint8Array(value.buffer, value.byteOffset, value.byteLength).slice();
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown, index) => toHostValue(item, `${path}[${index}]`, options));
  }
  if (isPlainObject(value)) {
    return propertiesToHost(value, path, options);
  }

  throw new ConversionError(`Unsupported native value at '${path}': ${describe(value)}`, {
    path,
    received: describe(value),
  });
}

/**
 * Converts a driver record into a plain object keyed in RETURN-clause order.
 * Conversion is all-or-nothing: the first failing field aborts the record.
 */
export function recordToObject(record: RecordLike, options: ConversionOptions = {}): ResultRecord {
  const out: ResultRecord = {};
  record.keys.forEach((key, index) => {
    const field = String(key);
    try {
      setOwn(out, field, toHostValue(record.get(index), field, options));
    } catch (err) {
      if (err instanceof ConversionError) throw err;
      throw new ConversionError(`Failed to convert field '${field}'`, { field }, err);
    }
  });
  return out;
}

/** Converts every record of a result; one failure fails the whole result. */
export function recordsToObjects(records: readonly RecordLike[], options: ConversionOptions = {}): ResultRecord[] {
  return records.map((record) => recordToObject(record, options));
}
