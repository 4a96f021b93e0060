import crypto from "crypto";
import type { Request, Response, NextFunction } from "express";

function digest(value: string): Buffer {
  return crypto.createHash("sha256").update(value).digest();
}

/** Constant-time comparison; hashing first keeps the buffers equal in length. */
export function tokensMatch(supplied: string, expected: string): boolean {
  return crypto.timingSafeEqual(digest(supplied), digest(expected));
}

export function requireAdmin(adminToken: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    const queryToken = typeof req.query.admin_token === "string" ? req.query.admin_token : undefined;
    const supplied = req.get("X-Admin-Token") ?? queryToken;

    if (!supplied || !tokensMatch(supplied, adminToken)) {
      return res.status(403).json({ ok: false, error: "Admin access required" });
    }
    next();
  };
}
