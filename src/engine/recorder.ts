/**
 * Trace Recorder — the path one evaluation took.
 *
 * Append-only and scoped to a single evaluation. A delegated sub-tree is
 * evaluated into its own recorder and then spliced in, so the final trace
 * is one linear, contiguously numbered sequence however deep the
 * delegation went.
 */

export interface TraceEntry {
  /** Position in the whole (spliced) trace, from 0. */
  readonly step: number
  readonly treeId: string
  readonly nodeId: string
  /** Delegation nesting: 0 for the tree being evaluated, 1 for its sub-trees, ... */
  readonly depth: number
  readonly kind: 'decision' | 'outcome'
  readonly description: string
  readonly result?: boolean
  readonly branch?: 'yes' | 'no'
  readonly rationale?: string
  readonly outcome?: string
}

export type TraceEntryInput = Omit<TraceEntry, 'step'>

export class TraceRecorder {
  private readonly entries: TraceEntry[] = []
  private finalized = false

  get size(): number {
    return this.entries.length
  }

  /** Append one entry; returns its step index. */
  record(entry: TraceEntryInput): number {
    this.assertOpen()
    const step = this.entries.length
    this.entries.push(Object.freeze({ ...entry, step }))
    return step
  }

  /** Append a nested evaluation's entries in order, renumbering their steps. */
  splice(subTrace: readonly TraceEntry[]): void {
    this.assertOpen()
    for (const { step: _step, ...entry } of subTrace) {
      this.record(entry)
    }
  }

  finalize(): readonly TraceEntry[] {
    this.assertOpen()
    this.finalized = true
    return Object.freeze([...this.entries])
  }

  private assertOpen(): void {
    if (this.finalized) {
      throw new Error('Trace recorder is finalized; start a new one per evaluation')
    }
  }
}
