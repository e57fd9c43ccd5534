import { Request, Response, NextFunction, RequestHandler } from "express";

/**
 * Guards operator and trigger endpoints with the shared cron secret sent as
 * `Authorization: Bearer <secret>`. With no secret configured every request
 * is refused.
 */
export function requireBearerSecret(secret: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const authHeader = req.headers.authorization;
    if (!authHeader?.startsWith("Bearer ")) {
      res.status(401).json({ message: "No token provided" });
      return;
    }

    const token = authHeader.slice("Bearer ".length);
    if (!secret || token !== secret) {
      res.status(403).json({ message: "Unauthorized" });
      return;
    }

    next();
  };
}
