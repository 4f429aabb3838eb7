/**
 * Trace rendering — plain text, one line per entry, nested sub-tree
 * entries indented by their delegation depth:
 *
 *     |- [0] Is the person a child, sibling, ...? -> no (relationship parent in [child, ...]: false)
 *     |- [1] Not a qualifying child => not_qualifying_child
 *   [2] Is the person a qualifying child? -> no (qualifying-child => not_qualifying_child: false)
 *
 * A sub-tree's entries come before the entry of the node that delegated
 * to it.
 */

import type { EvaluationResult } from './evaluate'
import type { TraceEntry } from './recorder'

export function renderTraceEntry(entry: TraceEntry): string {
  const prefix = entry.depth === 0 ? '' : '  '.repeat(entry.depth) + '|- '
  if (entry.kind === 'outcome') {
    return `${prefix}[${entry.step}] ${entry.description} => ${entry.outcome ?? ''}`
  }
  return `${prefix}[${entry.step}] ${entry.description} -> ${entry.branch ?? ''} (${entry.rationale ?? ''})`
}

export function renderTrace(trace: readonly TraceEntry[]): string {
  return trace.map(renderTraceEntry).join('\n')
}

/** Outcome headline followed by the rendered trace. */
export function explainDecision(result: EvaluationResult): string {
  return `${result.treeId}: ${result.outcome}\n${renderTrace(result.trace)}`
}
