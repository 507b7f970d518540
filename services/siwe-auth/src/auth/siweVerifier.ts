import { BaseError, isHex, recoverMessageAddress, type Address as ViemAddress } from "viem";
import { createSiweMessage, parseSiweMessage, type SiweMessage } from "viem/siwe";
import { ConfigurationError, isValidAddress, type Address } from "@walletgate/shared";
import { AuthError } from "./errors.js";
import type { NonceStore } from "./nonceStore.js";
import type { Clock, VerifiedIdentity } from "./types.js";

export interface SiweVerifierConfig {
  /** Expected `domain` field */
  domain: string;
  /** Expected `uri` field; compared by origin */
  uri: string;
  /** Tolerated drift for issuedAt / notBefore */
  clockSkewMs: number;
}

/**
 * SIWE fields before validation, from either input form
 */
interface DraftMessage {
  domain?: string;
  address?: string;
  uri?: string;
  version?: string;
  chainId?: number;
  nonce?: string;
  issuedAt?: Date;
  statement?: string;
  expirationTime?: Date;
  notBefore?: Date;
  requestId?: string;
  resources?: string[];
  scheme?: string;
}

function malformed(message: string): AuthError {
  return new AuthError(message, "MALFORMED_MESSAGE");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function originOf(uri: string): string | null {
  try {
    return new URL(uri).origin;
  } catch {
    return null;
  }
}

function readString(fields: Record<string, unknown>, key: string): string | undefined {
  const value = fields[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw malformed(`${key} must be a string`);
  }
  return value;
}

function readDate(fields: Record<string, unknown>, key: string): Date | undefined {
  const value = readString(fields, key);
  if (value === undefined) return undefined;
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw malformed(`${key} is not a valid timestamp`);
  }
  return date;
}

function readChainId(fields: Record<string, unknown>): number | undefined {
  const value = fields.chainId;
  if (value === undefined || value === null) return undefined;
  if (typeof value === "number") return value;
  if (typeof value === "string" && /^\d+$/.test(value)) return Number(value);
  throw malformed("chainId must be an integer");
}

function readResources(fields: Record<string, unknown>): string[] | undefined {
  const value = fields.resources;
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value) || !value.every((item) => typeof item === "string")) {
    throw malformed("resources must be an array of strings");
  }
  return value;
}

function draftFromFields(fields: Record<string, unknown>): DraftMessage {
  return {
    domain: readString(fields, "domain"),
    address: readString(fields, "address"),
    uri: readString(fields, "uri"),
    version: readString(fields, "version"),
    chainId: readChainId(fields),
    nonce: readString(fields, "nonce"),
    issuedAt: readDate(fields, "issuedAt"),
    statement: readString(fields, "statement"),
    expirationTime: readDate(fields, "expirationTime"),
    notBefore: readDate(fields, "notBefore"),
    requestId: readString(fields, "requestId"),
    resources: readResources(fields),
    scheme: readString(fields, "scheme"),
  };
}

/**
 * Check required fields and their format
 */
function completeMessage(draft: DraftMessage): SiweMessage {
  const { domain, address, uri, version, chainId, nonce, issuedAt } = draft;
  if (
    domain === undefined ||
    address === undefined ||
    uri === undefined ||
    version === undefined ||
    chainId === undefined ||
    nonce === undefined ||
    issuedAt === undefined
  ) {
    const required = { domain, address, uri, version, chainId, nonce, issuedAt };
    const missing = Object.entries(required)
      .filter(([, value]) => value === undefined)
      .map(([key]) => key);
    throw malformed(`Missing fields: ${missing.join(", ")}`);
  }

  if (!isValidAddress(address)) {
    throw malformed("address must be 0x-prefixed 40 hex characters");
  }
  if (version !== "1") {
    throw malformed(`Unsupported SIWE version: ${version}`);
  }
  if (!Number.isInteger(chainId) || chainId <= 0) {
    throw malformed("chainId must be a positive integer");
  }
  if (!/^[a-zA-Z0-9]{8,}$/.test(nonce)) {
    throw malformed("nonce must be at least 8 alphanumeric characters");
  }
  if (Number.isNaN(issuedAt.getTime())) {
    throw malformed("issuedAt is not a valid timestamp");
  }

  return {
    domain,
    address,
    uri,
    version,
    chainId,
    nonce,
    issuedAt,
    statement: draft.statement,
    expirationTime: draft.expirationTime,
    notBefore: draft.notBefore,
    requestId: draft.requestId,
    resources: draft.resources,
    scheme: draft.scheme,
  };
}

const TIMESTAMP_LINES = [
  ["Issued At: ", "issuedAt"],
  ["Expiration Time: ", "expirationTime"],
  ["Not Before: ", "notBefore"],
] as const;

/**
 * Put the timestamps back as the client sent them. viem writes
 * `toISOString()`, but any RFC 3339 form may have been signed.
 */
function withSubmittedTimestamps(text: string, message: SiweMessage, fields: Record<string, unknown>): string {
  let result = text;
  for (const [label, key] of TIMESTAMP_LINES) {
    const date = message[key];
    const submitted = readString(fields, key);
    if (date === undefined || submitted === undefined) continue;
    result = result.replace(`\n${label}${date.toISOString()}`, `\n${label}${submitted}`);
  }
  return result;
}

/**
 * Parse a login message into validated fields plus the exact text that was signed.
 *
 * EIP-4361 text is verified as given. A field object is serialized with
 * viem, keeping the submitted timestamp strings.
 */
export function parseSiweInput(input: unknown): { message: SiweMessage; text: string } {
  if (typeof input === "string") {
    return { message: completeMessage(parseSiweMessage(input)), text: input };
  }

  if (!isRecord(input)) {
    throw malformed("message must be an EIP-4361 string or an object of SIWE fields");
  }

  const message = completeMessage(draftFromFields(input));
  try {
    return { message, text: withSubmittedTimestamps(createSiweMessage(message), message, input) };
  } catch (err) {
    throw malformed(err instanceof BaseError ? err.shortMessage : String(err));
  }
}

/**
 * Verifies Sign-In with Ethereum (EIP-4361) login messages.
 *
 * Checks run in a fixed order and stop at the first failure:
 *  1. structure             MALFORMED_MESSAGE
 *  2. domain / uri binding  DOMAIN_MISMATCH
 *  3. nonce consumption     INVALID_NONCE
 *  4. time window           MESSAGE_EXPIRED
 *  5. signature recovery    SIGNATURE_MISMATCH
 *
 * The nonce is burned at step 3 even when a later step fails, so a captured
 * nonce cannot be retried with other signatures.
 */
export class SiweVerifier {
  private expectedOrigin: string;

  constructor(
    private nonceStore: NonceStore,
    private config: SiweVerifierConfig,
    private now: Clock = Date.now
  ) {
    const origin = originOf(config.uri);
    if (!origin) {
      throw new ConfigurationError(`Invalid SIWE URI: "${config.uri}"`, ["SIWE_URI"]);
    }
    this.expectedOrigin = origin;
  }

  async verify(input: unknown, signature: unknown): Promise<VerifiedIdentity> {
    const { message, text } = parseSiweInput(input);

    if (message.domain !== this.config.domain || originOf(message.uri) !== this.expectedOrigin) {
      throw new AuthError("Message is not bound to this domain", "DOMAIN_MISMATCH");
    }

    await this.nonceStore.consume(message.nonce);

    this.checkTimeWindow(message);

    const address = await this.checkSignature(text, signature, message.address);

    return {
      address,
      chainId: message.chainId,
      issuedAt: message.issuedAt ?? new Date(this.now()),
      nonce: message.nonce,
      message,
    };
  }

  private checkTimeWindow(message: SiweMessage): void {
    const now = this.now();
    const latestStart = now + this.config.clockSkewMs;

    if (message.issuedAt && message.issuedAt.getTime() > latestStart) {
      throw new AuthError("Message issuedAt is in the future", "MESSAGE_EXPIRED");
    }
    if (message.notBefore && message.notBefore.getTime() > latestStart) {
      throw new AuthError("Message is not yet valid", "MESSAGE_EXPIRED");
    }
    if (message.expirationTime && message.expirationTime.getTime() <= now) {
      throw new AuthError("Message has expired", "MESSAGE_EXPIRED");
    }
  }

  /**
   * Recover the EIP-191 signer and compare it with the claimed address.
   * Returns the lowercase address.
   */
  private async checkSignature(text: string, signature: unknown, claimed: ViemAddress): Promise<Address> {
    if (typeof signature !== "string" || !isHex(signature)) {
      throw new AuthError("Malformed signature", "SIGNATURE_MISMATCH");
    }

    let recovered: ViemAddress;
    try {
      recovered = await recoverMessageAddress({ message: text, signature });
    } catch {
      throw new AuthError("Malformed signature", "SIGNATURE_MISMATCH");
    }

    const normalized = claimed.toLowerCase();
    if (!isValidAddress(normalized) || recovered.toLowerCase() !== normalized) {
      throw new AuthError("Signature does not match address", "SIGNATURE_MISMATCH");
    }
    return normalized;
  }
}
