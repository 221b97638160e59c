/**
 * GraphRenderer
 *
 * Dispatches a render request to the matching serializer and attaches the
 * summary and, on request, the detected cycles.
 *
 * An unknown format is rejected before anything is rendered.
 */

import { RenderError } from '../errors/GraphErrors.js';
import type { DependencyGraph, RenderFormat, RenderOptions, RenderResult } from '../types/graph-types.js';
import { CycleDetector } from './CycleDetector.js';
import { GraphAnalyzer } from './GraphAnalyzer.js';
import { renderGraphviz, renderTextTree, toGraphJson } from './serializers.js';

export const RENDER_FORMATS: readonly RenderFormat[] = ['text', 'json', 'graphviz'];

export function isRenderFormat(value: string): value is RenderFormat {
  return RENDER_FORMATS.some((format) => format === value);
}

export class GraphRenderer {
  /**
   * @param format - text, json or graphviz; an empty string means text
   * @throws RenderError UnsupportedFormat for any other value
   */
  static render(graph: DependencyGraph, format: string, options: RenderOptions = {}): RenderResult {
    const requested = format === '' ? 'text' : format;
    if (!isRenderFormat(requested)) {
      throw RenderError.unsupportedFormat(format, RENDER_FORMATS);
    }

    const summary = GraphAnalyzer.summarize(graph);
    const cycles = options.highlightCycles ? CycleDetector.detectCycles(graph) : [];

    switch (requested) {
      case 'text':
        return {
          format: requested,
          graphData: renderTextTree(graph, options.maxDepth ?? 0, options.includeVersions ?? false),
          summary,
          cycles,
        };

      case 'json': {
        const jsonData = toGraphJson(graph);
        return {
          format: requested,
          graphData: JSON.stringify(jsonData, null, 2),
          jsonData,
          summary,
          cycles,
        };
      }

      case 'graphviz':
        return {
          format: requested,
          graphData: renderGraphviz(graph, options.includeVersions ?? false),
          summary,
          cycles,
        };
    }
  }
}
