/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

export { SERVER_INFO_URI, serverInfoResource, describeServer, createServerInfoHandler, type ServerInfo } from './server-info.js'
