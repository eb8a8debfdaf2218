/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import type { ResourceDefinition, ResourceHandler } from '../capabilities/capability.js'
import type { McpServer } from '../servers/server.js'

export const SERVER_INFO_URI = 'runtime://server/info'

export const serverInfoResource: ResourceDefinition = {
  uri: SERVER_INFO_URI,
  name: 'server-info',
  description: 'Server identity, negotiated protocol version and registered capabilities',
  mimeType: 'application/json'
}

export interface ServerInfo {
  name: string
  version: string
  protocolVersion: string | null
  tools: string[]
  resources: string[]
  prompts: string[]
}

export function describeServer(server: McpServer): ServerInfo {
  return {
    name: server.name,
    version: server.version,
    protocolVersion: server.session.protocolVersion,
    tools: server.registry.list('tool').map((tool) => tool.definition.name),
    resources: server.registry.list('resource').map((resource) => resource.definition.uri),
    prompts: server.registry.list('prompt').map((prompt) => prompt.definition.name)
  }
}

export function createServerInfoHandler(server: McpServer): ResourceHandler {
  return () => JSON.stringify(describeServer(server), null, 2)
}
