import type { Logger } from '../logger'
import { errorMessage } from '../errors'
import { formatIssues } from '../types/protocol'
import type { Command, CommandOutcome } from '../types/command'
import { CapabilitySchema, isCommandKind, type Actuator, type ValidCommand } from './capabilities'
import { Mutex } from './Mutex'

const ABANDONED = Symbol('abandoned')

export type Validation =
  | { ok: true;  command: ValidCommand }
  | { ok: false; reason: string }

/** Checks a command against the capability table. Never touches the actuator. */
export function validateCommand(command: Command): Validation {
  if (!isCommandKind(command.kind)) {
    return { ok: false, reason: `unknown command kind "${command.kind}"` }
  }
  const parsed = CapabilitySchema.safeParse({ kind: command.kind, parameters: command.parameters })
  if (!parsed.success) {
    return { ok: false, reason: `invalid parameters: ${formatIssues(parsed.error)}` }
  }
  return { ok: true, command: { ...parsed.data, id: command.id, issuedAt: command.issuedAt } }
}

/**
 * Runs commands against the actuator, one at a time.
 *
 * Validation happens before the lock, so a bad command is rejected at once
 * even while another command holds the actuator. After abort() nothing new
 * reaches the actuator and running commands are asked to stop.
 */
export class CommandExecutor {
  private readonly lock     = new Mutex()
  private readonly shutdown = new AbortController()
  private readonly log: Logger

  constructor(private readonly actuator: Actuator, log: Logger) {
    this.log = log.child({ component: 'command-executor' })
  }

  get aborted(): boolean { return this.shutdown.signal.aborted }

  /** Always resolves; every failure becomes an outcome. */
  async execute(command: Command): Promise<CommandOutcome> {
    const commandId = command.id
    if (this.aborted) return { commandId, outcome: 'failed', reason: 'shutdown' }

    const validation = validateCommand(command)
    if (!validation.ok) {
      this.log.warn({ commandId, kind: command.kind, reason: validation.reason }, 'command rejected')
      return { commandId, outcome: 'rejected', reason: validation.reason }
    }

    const valid  = validation.command
    const signal = this.shutdown.signal
    try {
      const result = await this.lock.runExclusive(async () => {
        if (signal.aborted) return ABANDONED
        this.log.info({ commandId, kind: valid.kind, parameters: valid.parameters }, 'executing command')
        return this.actuator.apply(valid, signal)
      })
      if (result === ABANDONED) return { commandId, outcome: 'failed', reason: 'shutdown' }
      this.log.info({ commandId, kind: valid.kind }, 'command completed')
      return result === undefined
        ? { commandId, outcome: 'completed' }
        : { commandId, outcome: 'completed', result }
    } catch (err) {
      if (signal.aborted) return { commandId, outcome: 'failed', reason: 'shutdown' }
      this.log.error({ commandId, kind: valid.kind, err: errorMessage(err) }, 'command failed')
      return { commandId, outcome: 'failed', reason: errorMessage(err) }
    }
  }

  /** Stop accepting work and signal running commands to give up. */
  abort(): void {
    if (this.aborted) return
    this.log.info('aborting pending commands')
    this.shutdown.abort()
  }
}
