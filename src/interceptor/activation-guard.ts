// =============================================================================
// Activation guard — Process-wide ownership of hook points
// =============================================================================

import { InterceptionError } from "../errors.js";

const owners = new Map<string, object>();

/** Throws when any interceptor, including `owner`, already holds the hook point. */
export function claimHookPoint(id: string, owner: object): void {
  if (owners.has(id)) {
    throw new InterceptionError(`hook point "${id}" is already intercepted`);
  }
  owners.set(id, owner);
}

export function releaseHookPoint(id: string, owner: object): void {
  if (owners.get(id) === owner) owners.delete(id);
}

export function isHookPointClaimed(id: string): boolean {
  return owners.has(id);
}
