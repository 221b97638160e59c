/**
 * JSON Formatter
 *
 * Outputs one JSON document per result for:
 * - Machine parsing
 * - CI/CD integration
 *
 * Errors and warnings go to stderr as single JSON lines.
 */

import { isGraphError } from '@agentgraph/engine';
import type { Formatter, FormatterOptions } from './Formatter.js';
import type { CheckView, GraphView, ResolutionView, ValidationView } from '../types/CliViews.js';
import { toResolutionJson } from '../utils/resolution.js';

/**
 * JSON output formatter
 */
export class JsonFormatter implements Formatter {
  private readonly options: FormatterOptions;

  constructor(options: FormatterOptions = {}) {
    this.options = options;
  }

  showGraph({ result, discovery }: GraphView): void {
    this.print({
      type: 'graph',
      format: result.format,
      graph: result.jsonData ?? result.graphData,
      summary: result.summary,
      cycles: result.cycles,
      discovery,
    });
  }

  showResolution(view: ResolutionView): void {
    this.print({ type: 'resolution', ...toResolutionJson(view) });
  }

  showCheck({ discovery, dangling, cycles }: CheckView): void {
    this.print({
      type: 'check',
      valid: dangling.length === 0 && cycles.length === 0,
      dangling,
      cycles,
      discovery,
    });
  }

  showValidation({ report }: ValidationView): void {
    this.print({ type: 'validation', ...report });
  }

  showError(error: Error): void {
    const jsonError = isGraphError(error)
      ? { type: 'error', timestamp: new Date().toISOString(), error: error.toSimpleObject() }
      : {
          type: 'error',
          timestamp: new Date().toISOString(),
          error: {
            name: error.name,
            message: error.message,
            ...(this.options.verbose ? { stack: error.stack } : {}),
          },
        };

    console.error(JSON.stringify(jsonError));
  }

  showWarning(message: string): void {
    console.error(JSON.stringify({ type: 'warning', timestamp: new Date().toISOString(), message }));
  }

  private print(payload: Record<string, unknown>): void {
    console.log(JSON.stringify(payload, null, 2));
  }
}
