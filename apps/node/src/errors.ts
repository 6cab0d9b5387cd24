/**
 * HTTP error mapping.
 *
 *   ContractError  precondition → 422, authorization → 403, transport → 502
 *   LedgerError    → 422 (the caller's native balance cannot cover the call)
 *   schema failure → 400
 *   anything else  → 500
 */

import type { FastifyReply, FastifyRequest } from "fastify";
import { LedgerError } from "@setmint/ledger";
import { isContractError, toJsonValue, type ErrorKind } from "@setmint/contract";

const KIND_STATUS: Record<ErrorKind, number> = {
  precondition: 422,
  authorization: 403,
  transport: 502,
};

function isValidationError(err: unknown): err is Error & { validation: unknown } {
  return err instanceof Error && "validation" in err && err.validation !== undefined;
}

export function handleError(err: unknown, request: FastifyRequest, reply: FastifyReply) {
  if (isContractError(err)) {
    const { code, ...detail } = err.failure;
    request.log.info({ code, kind: err.kind }, "call rejected");
    return reply.status(KIND_STATUS[err.kind]).send({
      error: code,
      kind: err.kind,
      detail: toJsonValue(detail),
    });
  }
  if (err instanceof LedgerError) {
    return reply.status(422).send({ error: err.code, detail: err.message });
  }
  if (isValidationError(err)) {
    return reply.status(400).send({ error: "invalid_request", detail: err.message });
  }
  request.log.error({ err }, "unhandled error");
  return reply.status(500).send({ error: "internal_error" });
}
