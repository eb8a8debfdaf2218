/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import { createChildLogger } from '../logger.js'
import type {
  ApplicationConfiguration,
  ExecutionPolicy,
  ObservabilityConfiguration,
  ServerIdentity
} from './schema-definitions.js'
import { ConfigurationAssembler } from './configuration-assembler.js'

/**
 * Lazily loaded, process-wide view of the configuration
 */
export class ApplicationConfigurationManager {
  private static instance: ApplicationConfigurationManager | null = null
  private loadedConfiguration: ApplicationConfiguration | null = null
  private readonly logger = createChildLogger('config-manager')

  private constructor() {}

  static getInstance(): ApplicationConfigurationManager {
    ApplicationConfigurationManager.instance ??= new ApplicationConfigurationManager()
    return ApplicationConfigurationManager.instance
  }

  private ensureConfigurationLoaded(): ApplicationConfiguration {
    if (!this.loadedConfiguration) {
      this.loadedConfiguration = ConfigurationAssembler.assembleFromEnvironment()
      this.logger.info({
        serverName: this.loadedConfiguration.server.name,
        version: this.loadedConfiguration.server.version,
        maxConcurrency: this.loadedConfiguration.execution.maxConcurrency,
        logLevel: this.loadedConfiguration.logging.level
      }, 'Configuration loaded successfully')
    }
    return this.loadedConfiguration
  }

  getServerIdentity(): Readonly<ServerIdentity> {
    return { ...this.ensureConfigurationLoaded().server }
  }

  getExecutionPolicy(): Readonly<ExecutionPolicy> {
    return { ...this.ensureConfigurationLoaded().execution }
  }

  getObservabilityConfiguration(): Readonly<ObservabilityConfiguration> {
    return { ...this.ensureConfigurationLoaded().logging }
  }

  getCompleteConfiguration(): Readonly<ApplicationConfiguration> {
    return { ...this.ensureConfigurationLoaded() }
  }

  resetConfigurationForTesting(): void {
    this.loadedConfiguration = null
  }
}
