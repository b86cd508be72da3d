import type { FastifyReply } from "fastify";
import type { ZodError } from "zod";
import { type WalletError, WalletErrorCode } from "../errors";

const WALLET_ERROR_STATUS: Record<WalletErrorCode, number> = {
  [WalletErrorCode.ForeignAddress]: 404,
  [WalletErrorCode.UnknownCoin]: 404,
  [WalletErrorCode.NoOwnedAddresses]: 409,
  [WalletErrorCode.InsufficientFunds]: 422,
  [WalletErrorCode.ZeroCoinValue]: 400,
  [WalletErrorCode.ZeroInputs]: 400,
  [WalletErrorCode.InvalidAmount]: 400,
};

export function sendWalletError(reply: FastifyReply, error: WalletError) {
  return reply.status(WALLET_ERROR_STATUS[error.code]).send(error.toJSON());
}

export function sendInvalidRequest(reply: FastifyReply, error: ZodError) {
  return reply.status(400).send({
    error: 'Invalid request',
    issues: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
  });
}
