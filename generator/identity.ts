/**
 * Identifier issuing for one generation run.
 *
 * `hashed` ids are a pure function of a logical name, so a fixture dataset
 * gets the same ids on every run and store. `seeded` ids come from the run's
 * RNG. Either way every id handed out is recorded and never issued twice.
 */

import * as crypto from 'crypto'
import { generateUuid, type Rng } from './rng'

export type IdMode = 'hashed' | 'seeded'

export class IdentityCollisionError extends Error {
  readonly name = 'IdentityCollisionError'

  constructor(
    readonly logicalName: string,
    readonly id: string
  ) {
    super(`Identifier ${id} for "${logicalName}" was already issued in this run`)
  }
}

const SEEDED_REDRAW_LIMIT = 16

/**
 * UUID-formatted digest of `namespace:name` (version nibble 5, RFC 4122 variant).
 */
export function hashedUuid(namespace: string, name: string): string {
  const bytes = crypto.createHash('sha256').update(`${namespace}:${name}`).digest().subarray(0, 16)
  bytes[6] = (bytes[6] & 0x0f) | 0x50
  bytes[8] = (bytes[8] & 0x3f) | 0x80
  const hex = bytes.toString('hex')
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`
}

export class IdentityFactory {
  private readonly issued = new Set<string>()

  constructor(
    readonly mode: IdMode,
    private readonly rng: Rng,
    private readonly namespace = 'chatbench'
  ) {}

  issue(logicalName: string): string {
    if (this.mode === 'hashed') {
      const id = hashedUuid(this.namespace, logicalName)
      if (this.issued.has(id)) throw new IdentityCollisionError(logicalName, id)
      this.issued.add(id)
      return id
    }

    for (let attempt = 0; attempt < SEEDED_REDRAW_LIMIT; attempt++) {
      const id = generateUuid(this.rng)
      if (!this.issued.has(id)) {
        this.issued.add(id)
        return id
      }
    }
    throw new IdentityCollisionError(logicalName, 'seeded draw')
  }

  get size(): number {
    return this.issued.size
  }
}
