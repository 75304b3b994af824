import { AuthPhase1Failed, AuthPhase2Failed } from "./errors.js";
import { fetchWithRetry, retryOperation, type RequestOptions } from "./http.js";

export const AUTH1_URL = "https://radiko.jp/v2/api/auth1";
export const AUTH2_URL = "https://radiko.jp/v2/api/auth2";

/** Publicly known key shipped with the radiko HTML5 player. */
export const RADIKO_AUTH_KEY = "bcd151073c03b352e1ef2fd66c32209da9ca0afa";

const CLIENT_HEADERS = {
  "x-radiko-app": "pc_html5",
  "x-radiko-app-version": "0.0.1",
  "x-radiko-device": "pc",
  "x-radiko-user": "dummy_user",
} as const;

export interface AuthSession {
  token: string;
  areaId: string;
}

interface Challenge {
  token: string;
  offset: number;
  length: number;
}

/**
 * base64 of `secret[offset, offset + length)`.
 */
export function derivePartialKey(
  offset: number,
  length: number,
  secret: string = RADIKO_AUTH_KEY,
): string {
  if (
    !Number.isInteger(offset) ||
    !Number.isInteger(length) ||
    offset < 0 ||
    length <= 0 ||
    offset + length > secret.length
  ) {
    throw new RangeError(
      `Key range out of bounds: offset=${offset} length=${length}`,
    );
  }
  return Buffer.from(secret.slice(offset, offset + length), "ascii").toString(
    "base64",
  );
}

/**
 * Two-phase handshake: auth1 hands out a token plus a key range, auth2 checks
 * the partial key and answers with the caller's area. `retry`, when given,
 * re-runs the whole sequence.
 */
export async function authorize(
  options: RequestOptions = {},
): Promise<AuthSession> {
  return retryOperation(async () => {
    const challenge = await requestChallenge(options);
    const areaId = await confirmChallenge(challenge, options);
    return { token: challenge.token, areaId };
  }, options.retry);
}

async function requestChallenge(options: RequestOptions): Promise<Challenge> {
  let resp: Response;
  try {
    resp = await fetchWithRetry(
      AUTH1_URL,
      { headers: CLIENT_HEADERS },
      { timeoutMs: options.timeoutMs },
    );
  } catch (error) {
    throw new AuthPhase1Failed("auth1 request failed", { cause: error });
  }
  if (!resp.ok) {
    throw new AuthPhase1Failed(`auth1 failed: ${resp.status}`);
  }

  const token = resp.headers.get("x-radiko-authtoken");
  const offsetStr = resp.headers.get("x-radiko-keyoffset");
  const lengthStr = resp.headers.get("x-radiko-keylength");
  if (!token || !offsetStr || !lengthStr) {
    throw new AuthPhase1Failed(
      "auth1 response is missing token or key range headers",
    );
  }

  const offset = Number(offsetStr);
  const length = Number(lengthStr);
  if (
    !Number.isInteger(offset) ||
    !Number.isInteger(length) ||
    offset < 0 ||
    length <= 0 ||
    offset + length > RADIKO_AUTH_KEY.length
  ) {
    throw new AuthPhase1Failed(
      `auth1 returned an unusable key range: offset=${offsetStr} length=${lengthStr}`,
    );
  }
  return { token, offset, length };
}

async function confirmChallenge(
  challenge: Challenge,
  options: RequestOptions,
): Promise<string> {
  const partialKey = derivePartialKey(challenge.offset, challenge.length);
  let resp: Response;
  try {
    resp = await fetchWithRetry(
      AUTH2_URL,
      {
        headers: {
          "x-radiko-authtoken": challenge.token,
          "x-radiko-device": CLIENT_HEADERS["x-radiko-device"],
          "x-radiko-partialkey": partialKey,
          "x-radiko-user": CLIENT_HEADERS["x-radiko-user"],
        },
      },
      { timeoutMs: options.timeoutMs },
    );
  } catch (error) {
    throw new AuthPhase2Failed("auth2 request failed", { cause: error });
  }
  if (!resp.ok) {
    throw new AuthPhase2Failed(`auth2 failed: ${resp.status}`);
  }

  const body = await resp.text();
  const areaId = body.split(",")[0]?.trim() ?? "";
  if (areaId === "") {
    throw new AuthPhase2Failed("auth2 returned an empty area");
  }
  return areaId;
}
