import express from "express";
import { logDebug } from "../logging";
import { DocumentStoreFactory } from "../storage/DocumentStore";
import { StoreCredentials } from "../types";
import { RequestRouter, ResponseRouter } from "./actionCodeRouters";

export interface ActionCodeRouteOptions {
  createStore: DocumentStoreFactory;
  tempRoot: string;
  maxFileBytes: number;
  cancelCheckoutOnFailure: boolean;
  transactionNumber?: string;
}

function readString(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function parseBasicCredentials(header: string | undefined): StoreCredentials | null {
  const match = /^Basic\s+(.+)$/i.exec(header || "");
  if (!match) {
    return null;
  }

  const decoded = Buffer.from(match[1], "base64").toString("utf8");
  const separator = decoded.indexOf(":");
  if (separator < 0) {
    return null;
  }

  return {
    username: decoded.slice(0, separator),
    password: decoded.slice(separator + 1)
  };
}

export function createActionCodeRoutes(options: ActionCodeRouteOptions): express.Router {
  const router = express.Router();

  router.all("/actioncode", async (req, res, next) => {
    try {
      const credentials = parseBasicCredentials(req.header("authorization"));
      if (!credentials) {
        res.setHeader("WWW-Authenticate", 'Basic realm="git-doc-mapper"');
        return res.status(401).json({ error: "basic authentication is required" });
      }

      const transactionNumber = readString(req.query.tranxNum);
      if (options.transactionNumber && transactionNumber !== options.transactionNumber) {
        return res.status(404).json({ error: "unknown transaction" });
      }

      const method = req.method;
      const route = readString(req.query.route);
      logDebug("[GIT-DOC-REQUEST]", { method, route, transactionNumber, user: credentials.username });

      const requestRouter = new RequestRouter(options.createStore(credentials), {
        tempRoot: options.tempRoot,
        maxFileBytes: options.maxFileBytes,
        cancelCheckoutOnFailure: options.cancelCheckoutOnFailure,
        checkedInBy: credentials.username || undefined
      });
      const responseRouter = new ResponseRouter();

      const reqResults = await requestRouter.handleRoute(method, route, req);
      if (reqResults !== undefined) {
        responseRouter.handleRoute(method, route, res, reqResults);
      }

      if (!res.headersSent) {
        return res.status(200).end();
      }
      return;
    } catch (error) {
      return next(error);
    }
  });

  return router;
}
