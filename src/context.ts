import { AsyncLocalStorage } from "async_hooks";
import { VerifiedIdentity } from "./auth/types.js";

interface RequestContext {
  identity: VerifiedIdentity;
}

export const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

/**
 * Identity of the caller whose request is being handled.
 */
export function getVerifiedIdentity(): VerifiedIdentity {
  const context = asyncLocalStorage.getStore();
  if (!context) {
    throw new Error(
      "No request context found - are you calling this from within a request handler?",
    );
  }
  return context.identity;
}

export function withIdentity<T>(
  identity: VerifiedIdentity,
  fn: () => T,
): T {
  return asyncLocalStorage.run({ identity }, fn);
}
