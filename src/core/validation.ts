import type { ApiGateway } from "@/clients/manageiq-client";
import { decodeValidationSnapshot } from "@/clients/decode";
import { VALIDATION } from "@/lib/constants";
import { attempt } from "@/lib/errors";
import type {
  ResourceId,
  ValidationDetails,
  ValidationOutcome,
  ValidationRecord,
  ValidationSnapshot,
} from "@/lib/types";
import { consola } from "consola";
import pRetry, { AbortError } from "p-retry";

export interface ValidationPollOptions {
  iterations?: number;
  waitMs?: number;
}

class ValidationPending extends Error {
  override name = "ValidationPending";
}

export function fetchValidationSnapshot(
  gateway: ApiGateway,
  providerId: ResourceId,
): Promise<ValidationSnapshot> {
  return attempt("get provider data", async () =>
    decodeValidationSnapshot(
      await gateway.get(`/providers/${providerId}`, { attributes: "authentications" }),
    ),
  );
}

/** True once either validation timestamp moved away from the prior snapshot. */
function validated(prior: ValidationRecord | undefined, current: ValidationRecord | undefined): boolean {
  return (
    (prior?.last_valid_on ?? null) !== (current?.last_valid_on ?? null) ||
    (prior?.last_invalid_on ?? null) !== (current?.last_invalid_on ?? null)
  );
}

function collectDetails(snapshot: ValidationSnapshot, authtypes: string[]): ValidationDetails {
  const details: ValidationDetails = {};
  for (const authtype of authtypes) {
    const record = snapshot[authtype];
    details[authtype] = [record?.status ?? VALIDATION.IN_PROGRESS, record?.status_details ?? ""];
  }
  return details;
}

/**
 * Polls the provider's authentications until every authtype in `authtypes`
 * has a new validation timestamp, then reports whether all came back Valid.
 *
 * An explicit failure is only acted on once every authtype has settled, so a
 * fast Invalid on one type still waits for the others. Runs out after
 * `iterations` fetches with the last observed details.
 */
export async function awaitValidation(
  gateway: ApiGateway,
  providerId: ResourceId,
  prior: ValidationSnapshot,
  authtypes: string[],
  options: ValidationPollOptions = {},
): Promise<ValidationOutcome> {
  const { iterations = VALIDATION.ITERATIONS, waitMs = VALIDATION.WAIT_MS } = options;
  if (authtypes.length === 0) {
    return { success: true, details: VALIDATION.ALL_VALID };
  }

  let details: ValidationDetails = {};

  try {
    return await pRetry(
      async () => {
        let current: ValidationSnapshot;
        try {
          current = await fetchValidationSnapshot(gateway, providerId);
        } catch (error) {
          throw new AbortError(error instanceof Error ? error : String(error));
        }

        details = collectDetails(current, authtypes);
        const settled = authtypes.every((authtype) => validated(prior[authtype], current[authtype]));
        if (settled) {
          const statuses = authtypes.map((authtype) => current[authtype]?.status ?? null);
          if (statuses.some((status) => status !== "Valid" && status !== null)) {
            return { success: false, details };
          }
          if (statuses.every((status) => status === "Valid")) {
            return { success: true, details: VALIDATION.ALL_VALID };
          }
        }
        throw new ValidationPending(`authentication validation pending for ${authtypes.join(", ")}`);
      },
      {
        retries: Math.max(0, iterations - 1),
        factor: 1,
        minTimeout: waitMs,
        maxTimeout: waitMs,
        randomize: false,
        onFailedAttempt: (error) => {
          consola.debug(`Validation attempt ${error.attemptNumber}/${iterations}: ${error.message}`);
        },
      },
    );
  } catch (error) {
    if (error instanceof ValidationPending) {
      return { success: false, details };
    }
    throw error;
  }
}
