import { NextFunction, Request, Response, Router } from "express";
import type { ConversationOrchestrator } from "../core/orchestrator";
import { errorMessage, log, safeStringify, sanitizeHeaders } from "../utils/logging";
import { maskDigits } from "../utils/mask";
import { parseWebhookRequest, turnResponse } from "../utils/webhook";

export type HoneypotRouteOptions = {
  orchestrator: ConversationOrchestrator;
  apiKey: string;
  neutralReply: string;
};

function logIncoming(req: Request): void {
  log.debug("INCOMING", `headers: ${safeStringify(sanitizeHeaders(req.headers), 2000)}`);
  log.debug("INCOMING", `body: ${safeStringify(req.body, 2000)}`);
}

function logOutgoing(status: number, body: unknown): void {
  log.info("OUTGOING", `status ${status} ${safeStringify(body, 500)}`);
}

export function createHoneypotRouter(options: HoneypotRouteOptions): Router {
  const router = Router();

  const requireApiKey = (req: Request, res: Response, next: NextFunction) => {
    if (!options.apiKey || req.header("x-api-key") === options.apiKey) {
      next();
      return;
    }
    const body = { status: "error", reply: "" };
    logOutgoing(401, body);
    res.status(401).json(body);
  };

  const handleWebhook = async (req: Request, res: Response) => {
    logIncoming(req);
    const request = parseWebhookRequest(req.body);
    if (!request) {
      const body = turnResponse(options.neutralReply);
      logOutgoing(200, body);
      res.status(200).json(body);
      return;
    }

    log.info("SCAMMER", maskDigits(request.message.text));
    const reply = await options.orchestrator.handle(request);
    log.info("HONEYPOT", maskDigits(reply.reply));
    logOutgoing(200, reply);
    res.status(200).json(reply);
  };

  for (const path of ["/api/honeypot", "/webhook"]) {
    router.post(path, requireApiKey, (req: Request, res: Response, next: NextFunction) => {
      handleWebhook(req, res).catch(next);
    });
  }

  return router;
}

/** App-level error handler; body-parser failures and route errors still get a success-shaped answer. */
export function webhookErrorHandler(neutralReply: string) {
  return (err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    log.error("HTTP", `request failed: ${errorMessage(err)}`);
    const body = turnResponse(neutralReply);
    logOutgoing(200, body);
    res.status(200).json(body);
  };
}
