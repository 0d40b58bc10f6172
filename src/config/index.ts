/**
 * Configuration for the exposition renderer.
 *
 * Provides a validated configuration object with a builder and an
 * environment loader. Validation happens when the configuration is created,
 * so a renderer never starts with settings that would produce wrong output.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import { DEFAULT_QUANTILES } from '../quantiles/index.js';
import {
  DEFAULT_HIGHEST_TRACKABLE_VALUE,
  DEFAULT_SIGNIFICANT_FIGURES,
  MAX_SIGNIFICANT_FIGURES,
  MIN_SIGNIFICANT_FIGURES,
} from '../sketch/index.js';

/**
 * Configuration options for the renderer
 */
export interface RendererConfigOptions {
  /** Quantiles rendered for every summary (default: 0, 0.5, 0.9, 0.95, 0.99, 0.999, 1) */
  quantiles?: readonly number[];
  /** Histogram sketch precision in significant decimal digits (default: 3) */
  significantFigures?: number;
  /** Largest histogram value accepted (default: Number.MAX_SAFE_INTEGER) */
  highestTrackableValue?: number;
}

/**
 * Zod schema for configuration validation.
 */
const rendererConfigSchema = z.object({
  quantiles: z.array(z.number().finite().min(0).max(1)),
  significantFigures: z.number().int().min(MIN_SIGNIFICANT_FIGURES).max(MAX_SIGNIFICANT_FIGURES),
  highestTrackableValue: z.number().int().min(2).max(Number.MAX_SAFE_INTEGER),
});

/**
 * Validated renderer configuration
 */
export class RendererConfig {
  readonly quantiles: readonly number[];
  readonly significantFigures: number;
  readonly highestTrackableValue: number;

  private constructor(options: Required<RendererConfigOptions>) {
    this.quantiles = Object.freeze([...options.quantiles]);
    this.significantFigures = options.significantFigures;
    this.highestTrackableValue = options.highestTrackableValue;
  }

  /**
   * Create configuration from options
   *
   * @throws ConfigurationError listing every invalid field
   */
  static create(options: RendererConfigOptions = {}): RendererConfig {
    const merged = {
      quantiles: [...(options.quantiles ?? DEFAULT_QUANTILES)],
      significantFigures: options.significantFigures ?? DEFAULT_SIGNIFICANT_FIGURES,
      highestTrackableValue: options.highestTrackableValue ?? DEFAULT_HIGHEST_TRACKABLE_VALUE,
    };

    const result = rendererConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
      throw new ConfigurationError(`Invalid renderer configuration: ${issues.join(', ')}`, {
        field: result.error.issues[0]?.path.join('.'),
      });
    }

    return new RendererConfig(result.data);
  }

  /**
   * Default configuration
   */
  static default(): RendererConfig {
    return RendererConfig.create();
  }

  /**
   * Create configuration from environment variables
   *
   * Environment variables:
   * - METRICS_QUANTILES: comma-separated quantiles, e.g. "0.5,0.9,0.99"
   * - METRICS_SIGNIFICANT_FIGURES: sketch precision (1-5)
   * - METRICS_HIGHEST_TRACKABLE_VALUE: largest histogram value accepted
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): RendererConfig {
    const builder = new RendererConfigBuilder();

    const quantiles = env['METRICS_QUANTILES'];
    if (quantiles !== undefined && quantiles.trim() !== '') {
      builder.quantiles(
        quantiles.split(',').map((part) => parseNumber('METRICS_QUANTILES', part.trim()))
      );
    }

    const figures = env['METRICS_SIGNIFICANT_FIGURES'];
    if (figures) {
      builder.significantFigures(parseNumber('METRICS_SIGNIFICANT_FIGURES', figures));
    }

    const highest = env['METRICS_HIGHEST_TRACKABLE_VALUE'];
    if (highest) {
      builder.highestTrackableValue(parseNumber('METRICS_HIGHEST_TRACKABLE_VALUE', highest));
    }

    return builder.build();
  }

  /**
   * Sketch options derived from this configuration
   */
  sketchOptions(): { significantFigures: number; highestTrackableValue: number } {
    return {
      significantFigures: this.significantFigures,
      highestTrackableValue: this.highestTrackableValue,
    };
  }
}

function parseNumber(variable: string, raw: string): number {
  const value = Number(raw);
  if (raw === '' || Number.isNaN(value)) {
    throw new ConfigurationError(`${variable} must be a valid number, got "${raw}"`, {
      field: variable,
    });
  }
  return value;
}

/**
 * Builder for creating renderer configuration with fluent API
 */
export class RendererConfigBuilder {
  private options: RendererConfigOptions = {};

  /**
   * Set the quantiles rendered for every summary
   */
  quantiles(quantiles: readonly number[]): this {
    this.options = { ...this.options, quantiles: [...quantiles] };
    return this;
  }

  /**
   * Add a single quantile after the ones already set
   */
  addQuantile(quantile: number): this {
    this.options = { ...this.options, quantiles: [...(this.options.quantiles ?? []), quantile] };
    return this;
  }

  /**
   * Set the sketch precision
   */
  significantFigures(figures: number): this {
    this.options = { ...this.options, significantFigures: figures };
    return this;
  }

  /**
   * Set the largest histogram value accepted
   */
  highestTrackableValue(value: number): this {
    this.options = { ...this.options, highestTrackableValue: value };
    return this;
  }

  /**
   * Build and validate the configuration
   */
  build(): RendererConfig {
    return RendererConfig.create(this.options);
  }
}
