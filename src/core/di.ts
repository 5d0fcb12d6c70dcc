/**
 * Named long-lived resources (the checkpoint database) with an
 * initialize/shutdown lifecycle. Shutdown runs newest-first.
 */

import { ArtemisError } from './errors.js'
import { toError } from '../utils/helpers.js'

export interface BaseService {
  /** Open connections and run setup */
  initialize(): Promise<void>
  /** Release resources */
  shutdown(): Promise<void>
}

interface ServiceEntry {
  readonly name: string
  readonly service: BaseService
}

/**
 * @example
 * const registry = new ServiceRegistry()
 * registry.register('database', createDatabaseService(path))
 * await registry.initializeAll()
 * // ...
 * await registry.shutdownAll()
 */
export class ServiceRegistry {
  private readonly _entries: ServiceEntry[] = []

  /** @throws {ArtemisError} SERVICE_DUPLICATE */
  register<T extends BaseService>(name: string, service: T): T {
    if (this._find(name) !== undefined) {
      throw new ArtemisError(`Service "${name}" is already registered`, 'SERVICE_DUPLICATE', { name })
    }
    this._entries.push({ name, service })
    return service
  }

  /** @throws {ArtemisError} SERVICE_NOT_FOUND */
  get(name: string): BaseService {
    const entry = this._find(name)
    if (entry === undefined) {
      throw new ArtemisError(`Service "${name}" is not registered`, 'SERVICE_NOT_FOUND', { name })
    }
    return entry.service
  }

  /** Typed lookup; undefined unless the service passes `guard` */
  resolve<T extends BaseService>(name: string, guard: (service: BaseService) => service is T): T | undefined {
    const service = this._find(name)?.service
    return service !== undefined && guard(service) ? service : undefined
  }

  has(name: string): boolean {
    return this._find(name) !== undefined
  }

  get serviceNames(): string[] {
    return this._entries.map((entry) => entry.name)
  }

  /** Stops at the first failing service */
  async initializeAll(): Promise<void> {
    for (const { service } of this._entries) {
      await service.initialize()
    }
  }

  /**
   * Every service is shut down even when an earlier one throws; the failures
   * are rethrown together.
   */
  async shutdownAll(): Promise<void> {
    const errors: Error[] = []
    for (const { service } of [...this._entries].reverse()) {
      await service.shutdown().catch((err: unknown) => {
        errors.push(toError(err))
      })
    }
    if (errors.length > 0) {
      throw new AggregateError(errors, `Shutdown errors in ${String(errors.length)} service(s)`)
    }
  }

  private _find(name: string): ServiceEntry | undefined {
    return this._entries.find((entry) => entry.name === name)
  }
}
