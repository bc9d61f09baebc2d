import type {
  MutationKind,
  MutationOutcome,
  SyncMode,
} from '@root/types/trakt.types.js'
import type { TraktContext } from '../api/helpers.js'

/**
 * | mode     | add  | remove |
 * |----------|------|--------|
 * | full     | sent | sent   |
 * | add-only | sent | logged |
 * | dry-run  | logged | logged |
 */
export function shouldExecute(mode: SyncMode, kind: MutationKind): boolean {
  switch (mode) {
    case 'full':
      return true
    case 'add-only':
      return kind === 'add'
    case 'dry-run':
      return false
  }
}

export interface MutationDescription {
  kind: MutationKind
  /** Completes "sync mode <mode> would have ..." */
  simulation: string
  /** Attached to the simulation log line */
  details?: Record<string, unknown>
}

/**
 * Runs a mutating call when the sync mode allows it; otherwise logs what
 * would have been sent and resolves without touching the network.
 */
export async function runMutation<T>(
  ctx: TraktContext,
  description: MutationDescription,
  execute: () => Promise<T>,
): Promise<MutationOutcome<T>> {
  const mode = ctx.config.syncMode
  if (!shouldExecute(mode, description.kind)) {
    ctx.log.info(
      description.details ?? {},
      `sync mode ${mode} would have ${description.simulation}`,
    )
    return { executed: false }
  }
  return { executed: true, result: await execute() }
}
