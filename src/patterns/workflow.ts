/**
 * CWL workflow documents
 *
 * Workflows are sent to the server verbatim; parsing only checks the file
 * is a YAML mapping and picks the label used as the process title.
 */

import yaml from 'js-yaml';
import { logger } from '../config/logger.js';
import { errorMessage } from '../errors.js';
import type { WorkflowDocument } from '../gateway/types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Label of a CWL document: the top-level label, or that of the Workflow
 * entry of a packed `$graph` document.
 */
export function workflowLabel(document: Record<string, unknown>): string | undefined {
  if (typeof document.label === 'string') return document.label;

  const graph = document.$graph;
  if (!Array.isArray(graph)) return undefined;

  const workflow = graph.find(
    (entry): entry is Record<string, unknown> => isRecord(entry) && entry.class === 'Workflow',
  );
  return workflow && typeof workflow.label === 'string' ? workflow.label : undefined;
}

/**
 * Parse CWL content. Returns null when it is not a YAML mapping.
 */
export function parseWorkflow(content: string): WorkflowDocument | null {
  let document: unknown;
  try {
    document = yaml.load(content);
  } catch (error) {
    logger.error('Invalid CWL document', { error: errorMessage(error) });
    return null;
  }

  if (!isRecord(document)) {
    logger.error('CWL document is not a mapping');
    return null;
  }

  return { content, label: workflowLabel(document) };
}
