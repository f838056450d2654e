/**
 * Repository verification routes
 */

import { Router, type NextFunction, type Request, type Response } from "express";
import { z } from "zod";
import { InvalidRepositoryUrlError, VerificationError } from "../errors.js";
import {
  processJavaScriptTypeScriptRepository,
  verifyRepository,
} from "../services/verification.js";
import type { LanguageFetcher } from "../types/github.js";

const githubUrlSchema = z.object({ github_url: z.string() });

/**
 * Read `github_url` from the JSON or form body, falling back to the query string
 */
export function readGithubUrl(req: Request): string {
  const fromBody = githubUrlSchema.safeParse(req.body);
  if (fromBody.success) return fromBody.data.github_url;

  const fromQuery = githubUrlSchema.safeParse(req.query);
  if (fromQuery.success) return fromQuery.data.github_url;

  throw new InvalidRepositoryUrlError("", "github_url is required");
}

export function createVerifyRouter(fetcher: LanguageFetcher): Router {
  const router = Router();

  router.post("/verify", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await verifyRepository(readGithubUrl(req), fetcher);
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  router.post("/process-js-ts", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await processJavaScriptTypeScriptRepository(readGithubUrl(req), fetcher);
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  return router;
}

function isMalformedBody(error: unknown): boolean {
  return (
    error instanceof SyntaxError &&
    "type" in error &&
    error.type === "entity.parse.failed"
  );
}

/**
 * Sole translator from failure kind to HTTP status
 */
export function verificationErrorHandler(
  error: unknown,
  _req: Request,
  res: Response,
  next: NextFunction
): void {
  if (res.headersSent) {
    next(error);
    return;
  }

  if (error instanceof VerificationError) {
    if (error.status >= 500) {
      console.error(`${error.kind}: ${error.message}`);
    }
    res.status(error.status).json({ error: error.kind, message: error.message });
    return;
  }

  if (isMalformedBody(error)) {
    res.status(400).json({ error: "InvalidRequestBody", message: "Request body is not valid JSON" });
    return;
  }

  console.error("Unexpected error while verifying repository:", error);
  res.status(500).json({ error: "InternalError", message: "Internal server error" });
}
