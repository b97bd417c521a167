/**
 * @module @indietreat/evm - EVM pieces of IndieTreat
 *
 * The mintable permit token used by the token checkout, and client-side permit signing.
 */

export { IndieTreatToken } from "./token";
export { signEip2612Permit, signEip2612PermitMessage } from "./client";
export { toClientEvmSigner } from "./signer";
export type { ClientEvmSigner } from "./signer";

export type {
  Eip2612PermitInfo,
  IndieTreatTokenConfig,
  PermitDomain,
  PermitDomainSource,
} from "./types";

export { eip2612PermitTypes, INDIETREAT_TOKEN_DECIMALS, INDIETREAT_TOKEN_VERSION } from "./constants";
