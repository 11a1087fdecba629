import crypto from "node:crypto";

export class AdminTokenVerifier {
  private readonly secret: Buffer;

  constructor(secret: string) {
    this.secret = Buffer.from(secret, "utf8");
  }

  /** Constant-time comparison against the configured secret; header arrays are rejected. */
  verify(token: unknown): boolean {
    if (typeof token !== "string" || token.length === 0) return false;
    const given = Buffer.from(token, "utf8");
    return given.length === this.secret.length && crypto.timingSafeEqual(given, this.secret);
  }
}
