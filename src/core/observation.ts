import type { Attributes } from '@opentelemetry/api';
import {
  applyAttributes,
  jsonAttributeValue,
  metadataAttributes,
  type AttributeTarget,
  type TraceAttribute,
} from './context';
import type { JsonValue } from './types';

export const AttributeKeyObservationType = 'langfuse.observation.type';
export const AttributeKeyObservationModel = 'langfuse.observation.model.name';
export const AttributeKeyObservationModelParameters = 'langfuse.observation.model.parameters';
export const AttributeKeyObservationInput = 'langfuse.observation.input';
export const AttributeKeyObservationOutput = 'langfuse.observation.output';
export const AttributeKeyObservationUsageInput = 'langfuse.observation.usage.input';
export const AttributeKeyObservationUsageOutput = 'langfuse.observation.usage.output';
export const AttributeKeyObservationUsageTotal = 'langfuse.observation.usage.total';
export const AttributeKeyObservationMetadata = 'langfuse.observation.metadata';

export interface TokenUsage {
  input: number;
  output: number;
  total: number;
}

/**
 * Attributes describing a single observation (one span), such as an LLM
 * generation with its model and token usage.
 */
export class ObservationAttributes {
  private type?: string;
  private model?: string;
  private modelParameters?: JsonValue;
  private input?: JsonValue;
  private output?: JsonValue;
  private usage?: TokenUsage;
  private readonly metadata = new Map<string, JsonValue>();

  /**
   * Langfuse observation type such as `generation`, `span` or `event`.
   */
  setType(type: string): this {
    this.type = type;
    return this;
  }

  setModel(model: string): this {
    this.model = model;
    return this;
  }

  setModelParameters(parameters: JsonValue): this {
    this.modelParameters = parameters;
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
   * Records token counts. The total is the sum of both.
   */
  setUsage(inputTokens: number, outputTokens: number): this {
    this.usage = { input: inputTokens, output: outputTokens, total: inputTokens + outputTokens };
    return this;
  }

  setMetadata(key: string, value: JsonValue): this {
    this.metadata.set(key, value);
    return this;
  }

  /**
   * Pairs for the fields that were set: type, model, model parameters,
   * input, output, usage, then metadata sorted by key.
   */
  emit(): TraceAttribute[] {
    const attributes: TraceAttribute[] = [];
    if (this.type !== undefined) {
      attributes.push([AttributeKeyObservationType, this.type]);
    }
    if (this.model !== undefined) {
      attributes.push([AttributeKeyObservationModel, this.model]);
    }
    if (this.modelParameters !== undefined) {
      attributes.push([AttributeKeyObservationModelParameters, jsonAttributeValue(this.modelParameters)]);
    }
    if (this.input !== undefined) {
      attributes.push([AttributeKeyObservationInput, jsonAttributeValue(this.input)]);
    }
    if (this.output !== undefined) {
      attributes.push([AttributeKeyObservationOutput, jsonAttributeValue(this.output)]);
    }
    if (this.usage !== undefined) {
      attributes.push(
        [AttributeKeyObservationUsageInput, this.usage.input],
        [AttributeKeyObservationUsageOutput, this.usage.output],
        [AttributeKeyObservationUsageTotal, this.usage.total],
      );
    }
    attributes.push(...metadataAttributes(AttributeKeyObservationMetadata, this.metadata));
    return attributes;
  }

  toAttributes(): Attributes {
    return Object.fromEntries(this.emit());
  }

  applyTo(span: AttributeTarget): void {
    applyAttributes(span, this.emit());
  }
}
