/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import { BaseError, ErrorCode } from '../errors.js'
import type { ImplementationInfo, RequestId } from '../types.js'

export enum SessionPhase {
  UNINITIALIZED = 'uninitialized',
  READY = 'ready',
  SHUTTING_DOWN = 'shutting_down',
  CLOSED = 'closed'
}

const ALLOWED_TRANSITIONS: Readonly<Record<SessionPhase, readonly SessionPhase[]>> = {
  [SessionPhase.UNINITIALIZED]: [SessionPhase.READY, SessionPhase.SHUTTING_DOWN],
  [SessionPhase.READY]: [SessionPhase.SHUTTING_DOWN],
  [SessionPhase.SHUTTING_DOWN]: [SessionPhase.CLOSED],
  [SessionPhase.CLOSED]: []
}

/**
 * Process-wide protocol state: lifecycle phase, negotiated version and the
 * ids of requests that have not been answered yet.
 *
 * The in-flight set is only touched from synchronous sections of the event
 * loop, which is what keeps begin/finish exclusive.
 */
export class Session {
  private currentPhase = SessionPhase.UNINITIALIZED
  private readonly inFlight = new Set<RequestId>()
  protocolVersion: string | null = null
  clientInfo: ImplementationInfo | null = null

  get phase(): SessionPhase {
    return this.currentPhase
  }

  get isReady(): boolean {
    return this.currentPhase === SessionPhase.READY
  }

  get isShuttingDown(): boolean {
    return this.currentPhase === SessionPhase.SHUTTING_DOWN || this.currentPhase === SessionPhase.CLOSED
  }

  canTransition(to: SessionPhase): boolean {
    return ALLOWED_TRANSITIONS[this.currentPhase].includes(to)
  }

  transition(to: SessionPhase): void {
    if (!this.canTransition(to)) {
      throw new BaseError(
        `Illegal session transition from ${this.currentPhase} to ${to}`,
        ErrorCode.INTERNAL_ERROR,
        { from: this.currentPhase, to }
      )
    }
    this.currentPhase = to
  }

  /**
   * Mark a request as open. Returns false when the id is already in flight.
   */
  begin(id: RequestId): boolean {
    if (this.inFlight.has(id)) {
      return false
    }
    this.inFlight.add(id)
    return true
  }

  /**
   * Close a request. Returns false when the id was not open.
   */
  finish(id: RequestId): boolean {
    return this.inFlight.delete(id)
  }

  isOpen(id: RequestId): boolean {
    return this.inFlight.has(id)
  }

  get inFlightCount(): number {
    return this.inFlight.size
  }
}
