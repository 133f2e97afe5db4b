/**
 * Service lifecycle and registry.
 *
 * Long-lived collaborators of a run (database, checkpoint store) implement
 * BaseService. The run command registers both with a ServiceRegistry, so the
 * orchestrator receives ready-to-use instances and never owns their lifecycle.
 */

// ---------------------------------------------------------------------------
// BaseService interface
// ---------------------------------------------------------------------------

export interface BaseService {
  /** Open connections, create directories, etc. Called once before use. */
  initialize(): Promise<void>

  /** Release resources. Called once, in reverse registration order. */
  shutdown(): Promise<void>
}

// ---------------------------------------------------------------------------
// ServiceRegistry
// ---------------------------------------------------------------------------

/**
 * Named registry with ordered lifecycle.
 *
 * Only services whose initialize() resolved are shut down, so a failure
 * halfway through startup leaves nothing half-closed.
 *
 * @example
 * const registry = new ServiceRegistry()
 * registry.register('database', databaseService)
 * registry.register('checkpoints', checkpointManager)
 * await registry.initializeAll()
 * try { ... } finally { await registry.shutdownAll() }
 */
export class ServiceRegistry {
  private readonly _services = new Map<string, BaseService>()
  private readonly _initialized: string[] = []

  /**
   * @throws {Error} if the name is already taken
   */
  register(name: string, service: BaseService): void {
    if (this._services.has(name)) {
      throw new Error(`Service "${name}" is already registered`)
    }
    this._services.set(name, service)
  }

  /**
   * @throws {Error} if nothing is registered under the name
   */
  get(name: string): BaseService {
    const service = this._services.get(name)
    if (service === undefined) {
      throw new Error(`Service "${name}" is not registered`)
    }
    return service
  }

  has(name: string): boolean {
    return this._services.has(name)
  }

  /** Initialize in registration order; stops at the first failure. */
  async initializeAll(): Promise<void> {
    for (const [name, service] of this._services) {
      if (this._initialized.includes(name)) continue
      await service.initialize()
      this._initialized.push(name)
    }
  }

  /**
   * Shut down initialized services in reverse order. Every service gets its
   * turn; failures are rethrown together as an AggregateError.
   */
  async shutdownAll(): Promise<void> {
    const errors: Error[] = []

    while (this._initialized.length > 0) {
      const name = this._initialized.pop()
      const service = name !== undefined ? this._services.get(name) : undefined
      if (service === undefined) continue
      try {
        await service.shutdown()
      } catch (err) {
        errors.push(err instanceof Error ? err : new Error(String(err)))
      }
    }

    if (errors.length > 0) {
      throw new AggregateError(errors, `Shutdown errors in ${errors.length} service(s)`)
    }
  }

  get serviceNames(): string[] {
    return [...this._services.keys()]
  }
}
