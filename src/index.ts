#!/usr/bin/env node
/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import { realpathSync } from 'fs'
import { pathToFileURL } from 'url'
import { createServer } from './builtins.js'
import { getApplicationConfiguration } from './configuration/index.js'
import { createChildLogger, createLogger, setDefaultLogger } from './logger.js'
import { McpStdioServer } from './servers/index.js'

async function main(): Promise<void> {
  const configuration = getApplicationConfiguration()
  const observability = configuration.getObservabilityConfiguration()
  setDefaultLogger(createLogger({ level: observability.level, structured: observability.structured, file: observability.file }))

  const logger = createChildLogger('main')
  const server = createServer()
  const host = new McpStdioServer(server)

  const onSignal = (signal: NodeJS.Signals): void => {
    logger.info({ signal }, 'Received signal, shutting down gracefully')
    void server.shutdown(`received ${signal}`).then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, 'Shutdown failed')
        process.exit(1)
      }
    )
  }
  process.on('SIGINT', onSignal)
  process.on('SIGTERM', onSignal)

  await host.run()
}

// Resolved through realpath so the npm bin symlink also starts the server
function isEntryPoint(): boolean {
  const invokedPath = process.argv[1]
  return invokedPath !== undefined && import.meta.url === pathToFileURL(realpathSync(invokedPath)).href
}

if (isEntryPoint()) {
  main().catch((error: unknown) => {
    createChildLogger('main').error({ err: error }, 'Fatal error in MCP server')
    process.exit(1)
  })
}

export { createServer, registerBuiltinCapabilities } from './builtins.js'
export { McpServer, McpStdioServer, Session, SessionPhase, type McpServerOptions } from './servers/index.js'
export { StdioTransport, LineFramer, type Transport } from './transport/stdio-transport.js'
export { ExecutionScheduler, type ExecutionOutcome, type ScheduledTask, type SchedulerConfig } from './execution/scheduler.js'
export { CapabilityRegistry } from './capabilities/capability-registry.js'
export * from './capabilities/capability.js'
export * from './errors.js'
export * from './types.js'
