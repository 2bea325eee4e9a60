import {
  IllegalTransitionError,
  MACHINE_STATUS,
  type MachineStatus,
  type TerminalStatus,
} from '@accuvm/types'

/**
 * Legal transitions per source status. Reset is handled separately since it
 * is legal from every status.
 */
const TRANSITIONS: Record<MachineStatus, readonly MachineStatus[]> = {
  [MACHINE_STATUS.WAITING]: [MACHINE_STATUS.READY, MACHINE_STATUS.ERRORED],
  [MACHINE_STATUS.READY]: [MACHINE_STATUS.RUNNING],
  [MACHINE_STATUS.RUNNING]: [MACHINE_STATUS.HALTED, MACHINE_STATUS.ERRORED],
  [MACHINE_STATUS.HALTED]: [],
  [MACHINE_STATUS.ERRORED]: [],
}

export function isTerminalStatus(
  status: MachineStatus,
): status is TerminalStatus {
  return (
    status === MACHINE_STATUS.HALTED || status === MACHINE_STATUS.ERRORED
  )
}

/**
 * Five-state lifecycle of the machine
 */
export class StatusMachine {
  private status: MachineStatus = MACHINE_STATUS.WAITING

  get current(): MachineStatus {
    return this.status
  }

  is(status: MachineStatus): boolean {
    return this.status === status
  }

  canTransition(to: MachineStatus): boolean {
    return TRANSITIONS[this.status].includes(to)
  }

  /**
   * Move to a new status. Requesting an undeclared transition is a
   * programming error.
   */
  transition(to: MachineStatus): MachineStatus {
    if (!this.canTransition(to)) {
      throw new IllegalTransitionError(this.status, to)
    }
    this.status = to
    return this.status
  }

  reset(): MachineStatus {
    this.status = MACHINE_STATUS.WAITING
    return this.status
  }
}
