// Command ID allocator.

import { COMMAND_ID_MODULUS, CommunicationError } from "@devlink/wire";

/**
 * Hands out command IDs from a counter that wraps at 65536.
 *
 * IDs are only unique among outstanding commands: the caller passes a
 * predicate telling which IDs are still waiting for a response, and those
 * are skipped.
 */
export class CommandIdAllocator {
  private nextId: number;

  constructor(first = 1) {
    this.nextId = first % COMMAND_ID_MODULUS;
  }

  /** Allocate the next ID not reported in use. */
  next(inUse: (id: number) => boolean = () => false): number {
    for (let attempt = 0; attempt < COMMAND_ID_MODULUS; attempt++) {
      const id = this.nextId;
      this.nextId = (this.nextId + 1) % COMMAND_ID_MODULUS;
      if (!inUse(id)) return id;
    }
    throw new CommunicationError(`no free command ID: ${COMMAND_ID_MODULUS} commands outstanding`);
  }
}
