import type { Attributes } from '@opentelemetry/api';
import type { AttributeValue, JsonValue } from './types';

export const AttributeKeySessionId = 'session.id';
export const AttributeKeyUserId = 'user.id';
export const AttributeKeyTraceName = 'langfuse.trace.name';
export const AttributeKeyTraceTags = 'langfuse.trace.tags';
export const AttributeKeyTracePublic = 'langfuse.trace.public';
export const AttributeKeyTraceMetadata = 'langfuse.trace.metadata';
export const AttributeKeyTraceInput = 'langfuse.trace.input';
export const AttributeKeyTraceOutput = 'langfuse.trace.output';

export type TraceAttribute = [key: string, value: AttributeValue];

/**
 * Trace-level attributes for one logical trace or request. Each instance is
 * owned by a single caller; use {@link TraceAttributeContext.child} to derive
 * an independent copy.
 */
export class TraceAttributeContext {
  private name?: string;
  private sessionId?: string;
  private userId?: string;
  private isPublic?: boolean;
  private input?: JsonValue;
  private output?: JsonValue;
  private readonly tags: string[] = [];
  private readonly metadata = new Map<string, JsonValue>();

  setName(name: string): this {
    this.name = name;
    return this;
  }

  setSessionId(id: string): this {
    this.sessionId = id;
    return this;
  }

  setUserId(id: string): this {
    this.userId = id;
    return this;
  }

  setPublic(isPublic: boolean): this {
    this.isPublic = isPublic;
    return this;
  }

  setInput(input: JsonValue): this {
    this.input = input;
    return this;
  }

  setOutput(output: JsonValue): this {
    this.output = output;
    return this;
  }

  /**
   * Appends tags in order. Duplicates are kept.
   */
  addTags(...tags: string[]): this {
    this.tags.push(...tags);
    return this;
  }

  setMetadata(key: string, value: JsonValue): this {
    this.metadata.set(key, value);
    return this;
  }

  child(): TraceAttributeContext {
    const copy = new TraceAttributeContext();
    copy.name = this.name;
    copy.sessionId = this.sessionId;
    copy.userId = this.userId;
    copy.isPublic = this.isPublic;
    copy.input = this.input;
    copy.output = this.output;
    copy.tags.push(...this.tags);
    for (const [key, value] of this.metadata) {
      copy.metadata.set(key, value);
    }
    return copy;
  }

  /**
   * Key/value pairs for every field that was set, in a fixed order: name,
   * session, user, tags, public flag, input, output, then metadata sorted by
   * key.
   */
  emit(): TraceAttribute[] {
    const attributes: TraceAttribute[] = [];
    if (this.name !== undefined) {
      attributes.push([AttributeKeyTraceName, this.name]);
    }
    if (this.sessionId !== undefined) {
      attributes.push([AttributeKeySessionId, this.sessionId]);
    }
    if (this.userId !== undefined) {
      attributes.push([AttributeKeyUserId, this.userId]);
    }
    if (this.tags.length > 0) {
      attributes.push([AttributeKeyTraceTags, [...this.tags]]);
    }
    if (this.isPublic !== undefined) {
      attributes.push([AttributeKeyTracePublic, this.isPublic]);
    }
    if (this.input !== undefined) {
      attributes.push([AttributeKeyTraceInput, jsonAttributeValue(this.input)]);
    }
    if (this.output !== undefined) {
      attributes.push([AttributeKeyTraceOutput, jsonAttributeValue(this.output)]);
    }
    attributes.push(...metadataAttributes(AttributeKeyTraceMetadata, this.metadata));
    return attributes;
  }

  toAttributes(): Attributes {
    return Object.fromEntries(this.emit());
  }

  applyTo(span: AttributeTarget): void {
    applyAttributes(span, this.emit());
  }
}

/**
 * Anything attributes can be written to, typically an OpenTelemetry span.
 */
export interface AttributeTarget {
  setAttribute(key: string, value: AttributeValue): unknown;
}

export function applyAttributes(span: AttributeTarget, attributes: TraceAttribute[]): void {
  for (const [key, value] of attributes) {
    span.setAttribute(key, value);
  }
}

/**
 * Strings, numbers and booleans pass through; other JSON values are
 * serialized.
 */
export function jsonAttributeValue(value: JsonValue): AttributeValue {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return JSON.stringify(value);
}

export function metadataAttributes(
  prefix: string,
  metadata: ReadonlyMap<string, JsonValue>,
): TraceAttribute[] {
  const attributes: TraceAttribute[] = [];
  for (const key of [...metadata.keys()].sort()) {
    const value = metadata.get(key);
    if (value !== undefined) {
      attributes.push([`${prefix}.${key}`, jsonAttributeValue(value)]);
    }
  }
  return attributes;
}
