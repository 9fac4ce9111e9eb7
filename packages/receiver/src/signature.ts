import { createHmac, timingSafeEqual } from "node:crypto";

/** Launchpad signs deliveries as `X-Hub-Signature: sha1=<hex hmac of the body>`. */
export function signPayload(body: string, secret: string): string {
  return "sha1=" + createHmac("sha1", secret).update(body).digest("hex");
}

export function verifySignature(
  body: string,
  signature: string | undefined,
  secret: string
): boolean {
  if (!signature || !signature.startsWith("sha1=")) return false;

  const expected = Buffer.from(signPayload(body, secret));
  const provided = Buffer.from(signature);
  if (expected.length !== provided.length) return false;

  return timingSafeEqual(expected, provided);
}
