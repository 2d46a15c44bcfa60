/**
 * Error taxonomy for ruleset processing.
 *
 * Every error keeps the underlying failure as its standard `cause`, so the
 * original error survives any number of {@link ContextError} wrappers.
 */
export class RulesetBotError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A ruleset definition file could not be read. */
export class ReadError extends RulesetBotError {}

/** Malformed JSON at the document, rule-parameter or workflow level. */
export class DecodeError extends RulesetBotError {}

export type EntityKind = "repository" | "team" | "custom-role";

/** The entity ID does not exist in the source organization. */
export class NotFoundInSourceError extends RulesetBotError {
  readonly kind: EntityKind;
  readonly org: string;
  readonly id: number;

  constructor(kind: EntityKind, org: string, id: number) {
    super(`No ${kind} with ID ${id} found in source organization ${org}`);
    this.kind = kind;
    this.org = org;
    this.id = id;
  }
}

/** No entity with the translated name exists in the target organization. */
export class NotFoundInTargetError extends RulesetBotError {
  readonly kind: EntityKind;
  readonly org: string;
  readonly entityName: string;

  constructor(kind: EntityKind, org: string, entityName: string) {
    super(
      `No ${kind} named '${entityName}' found in target organization ${org}`
    );
    this.kind = kind;
    this.org = org;
    this.entityName = entityName;
  }
}

/** JWT minting, installation lookup or token creation failed. */
export class AuthError extends RulesetBotError {}

/** Transport, rate-limit or permission failure from the GitHub API. */
export class UpstreamApiError extends RulesetBotError {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, options);
    this.status = options?.status;
  }
}

/** A bypass actor type the rewriter does not translate. Logged only. */
export class UnhandledActorTypeError extends RulesetBotError {
  readonly actorType: string;

  constructor(actorType: string) {
    super(`Unhandled actor type: ${actorType}`);
    this.actorType = actorType;
  }
}

/**
 * Adds identifying context (ruleset, file, actor or repository) to an error
 * as it unwinds.
 */
export class ContextError extends RulesetBotError {
  constructor(message: string, cause: unknown) {
    super(`${message}: ${errorMessage(cause)}`, { cause });
  }
}

/**
 * Returns true if the error, or any error in its cause chain, is an
 * instance of the given class.
 */
export function hasCause(
  error: unknown,
  errorClass: abstract new (...args: never[]) => Error
): boolean {
  return findCause(error, errorClass) !== undefined;
}

/**
 * Walks the cause chain and returns the first error of the given class.
 */
export function findCause<T extends Error>(
  error: unknown,
  errorClass: abstract new (...args: never[]) => T
): T | undefined {
  const seen = new Set<unknown>();
  let current: unknown = error;
  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof errorClass) {
      return current;
    }
    seen.add(current);
    current = current.cause;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
