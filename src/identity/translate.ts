import {
  NotFoundInSourceError,
  NotFoundInTargetError,
  type EntityKind,
} from "../shared/errors.js";

/**
 * What happens when the stable name has no counterpart in the target:
 * `fail` raises NotFoundInTargetError, `keep` leaves the entity unchanged.
 */
export type MissingInTargetPolicy = "fail" | "keep";

export const MISSING_IN_TARGET_POLICY: Readonly<
  Record<EntityKind, MissingInTargetPolicy>
> = {
  repository: "fail",
  team: "fail",
  "custom-role": "keep",
};

export interface ResolvedIdentity {
  kind: EntityKind;
  name: string;
  sourceId: number;
  targetId: number;
}

export type TranslationResult =
  | { status: "resolved"; identity: ResolvedIdentity }
  | { status: "unresolved"; kind: EntityKind; name: string; sourceId: number };

export interface TranslationRequest {
  kind: EntityKind;
  sourceOrg: string;
  targetOrg: string;
  idInSource: number;
  lookupNameInSource: (id: number) => Promise<string | null>;
  lookupIdInTarget: (name: string) => Promise<number | null>;
  missingInTarget?: MissingInTargetPolicy;
}

/**
 * Translates an organization-local ID into the target organization's ID
 * space: ID -> name in the source, then name -> ID in the target.
 *
 * @throws NotFoundInSourceError when the source has no entity with the ID
 * @throws NotFoundInTargetError when the target lacks the name and the
 *   policy is `fail`
 */
export async function translate(
  request: TranslationRequest
): Promise<TranslationResult> {
  const { kind, sourceOrg, targetOrg, idInSource } = request;
  const policy = request.missingInTarget ?? MISSING_IN_TARGET_POLICY[kind];

  const name = await request.lookupNameInSource(idInSource);
  if (name === null) {
    throw new NotFoundInSourceError(kind, sourceOrg, idInSource);
  }

  const targetId = await request.lookupIdInTarget(name);
  if (targetId === null) {
    if (policy === "fail") {
      throw new NotFoundInTargetError(kind, targetOrg, name);
    }
    return { status: "unresolved", kind, name, sourceId: idInSource };
  }

  return {
    status: "resolved",
    identity: { kind, name, sourceId: idInSource, targetId },
  };
}
