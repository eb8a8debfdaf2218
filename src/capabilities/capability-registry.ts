/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import { DuplicateCapabilityError, RegistryClosedError } from '../errors.js'
import { createChildLogger } from '../logger.js'
import {
  capabilityKey,
  type Capability,
  type CapabilityByKind,
  type CapabilityKind
} from './capability.js'

type CapabilityTables = { [K in CapabilityKind]: Map<string, CapabilityByKind[K]> }

/**
 * Holds the tools, resources and prompts a session exposes.
 *
 * Append-only until closed; listings follow registration order.
 */
export class CapabilityRegistry {
  private readonly tables: CapabilityTables = {
    tool: new Map(),
    resource: new Map(),
    prompt: new Map()
  }
  private closed = false
  private readonly logger = createChildLogger('capability-registry')

  register(capability: Capability): void {
    const key = capabilityKey(capability)

    if (this.closed) {
      throw new RegistryClosedError(capability.kind, key)
    }

    switch (capability.kind) {
      case 'tool':
        this.insert(this.tables.tool, key, capability)
        break
      case 'resource':
        this.insert(this.tables.resource, key, capability)
        break
      case 'prompt':
        this.insert(this.tables.prompt, key, capability)
        break
    }

    this.logger.debug({ kind: capability.kind, name: key }, 'Registered capability')
  }

  private insert<T extends Capability>(table: Map<string, T>, key: string, capability: T): void {
    if (table.has(key)) {
      throw new DuplicateCapabilityError(capability.kind, key)
    }
    table.set(key, capability)
  }

  lookup<K extends CapabilityKind>(kind: K, name: string): CapabilityByKind[K] | undefined {
    const table: Map<string, CapabilityByKind[K]> = this.tables[kind]
    return table.get(name)
  }

  list<K extends CapabilityKind>(kind: K): CapabilityByKind[K][] {
    const table: Map<string, CapabilityByKind[K]> = this.tables[kind]
    return Array.from(table.values())
  }

  size(kind: CapabilityKind): number {
    return this.tables[kind].size
  }

  /**
   * Reject all further registrations. Called when the session becomes ready.
   */
  close(): void {
    this.closed = true
  }

  get isClosed(): boolean {
    return this.closed
  }
}
