import express, { NextFunction, Request, Response } from "express";
import bodyParser from "body-parser";
import cors from "cors";
import { AppConfig } from "./config";
import { SubscriberState } from "./state";
import { getSubscriptions, topicForPath } from "./topics";
import { AppResponse, TOPICS } from "./types";
import { extractMessage } from "./validation";

// Bodies are read whole, whatever their size.
const NO_BODY_LIMIT = Infinity;

// Deliveries are parsed by hand so a malformed body becomes a DROP, not a 400.
const rawText = bodyParser.text({ type: () => true, limit: NO_BODY_LIMIT });
// Control calls carry no meaningful body; read it so the connection is drained.
const discardBody = bodyParser.raw({ type: () => true, limit: NO_BODY_LIMIT });

function drop(res: Response, message: string) {
  const body: AppResponse = { status: "DROP", message };
  return res.status(200).json(body);
}

export async function createApp(state: SubscriberState, config: Pick<AppConfig, "pubsubName">) {
  const app = express();
  app.use(cors());

  app.get("/", (_req, res) => {
    console.log("index called");
    const body: AppResponse = { message: "OK" };
    return res.status(200).json(body);
  });

  app.get("/dapr/subscribe", (_req, res) => {
    const subscriptions = getSubscriptions(config.pubsubName);
    console.log("subscribing to", subscriptions);
    return res.status(200).json(subscriptions);
  });

  // Armed failure modes answer before the body is read, whatever it holds.
  const answerArmed = (req: Request, res: Response, next: NextFunction) => {
    console.log(`delivery received on ${req.originalUrl}`);
    const flags = state.flags();
    if (flags.respondWithRetry) {
      const body: AppResponse = { status: "RETRY", message: "retry later" };
      return res.status(200).json(body);
    }
    if (flags.respondWithError) {
      return res.status(500).end();
    }
    return next();
  };

  const deliver = async (req: Request, res: Response) => {
    try {
      const rawBody = typeof req.body === "string" ? req.body : "";
      const extracted = extractMessage(rawBody);
      if (!extracted.ok) {
        console.warn("dropping undecodable delivery", { url: req.originalUrl, reason: extracted.reason });
        return drop(res, extracted.reason);
      }

      const topic = topicForPath(req.path);
      const recorded = topic !== undefined && (await state.record(topic, extracted.message));
      if (!recorded) {
        if (topic === undefined) {
          console.warn("delivery on a path that matches no topic", { url: req.originalUrl });
        } else {
          console.warn("redelivery of an already received message", { topic, message: extracted.message });
        }
        return drop(res, `Unexpected/Multiple redelivery of message from ${req.originalUrl}`);
      }

      if (state.flags().respondWithEmptyJSON) {
        return res.status(200).type("application/json").send("{}");
      }
      const body: AppResponse = { status: "SUCCESS", message: "consumed" };
      return res.status(200).json(body);
    } catch (err) {
      console.error("Error handling delivery", err);
      return res.status(500).json({ error: "internal error" });
    }
  };

  // A body that cannot be read is dropped like one that cannot be decoded.
  const dropUnreadable = (err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) return next(err);
    const reason = err instanceof Error ? err.message : String(err);
    console.warn("dropping unreadable delivery", { url: req.originalUrl, reason });
    return drop(res, reason);
  };

  for (const topic of TOPICS) {
    app.post(`/${topic}`, answerArmed, rawText, deliver, dropUnreadable);
  }

  app.post("/tests/get", discardBody, async (_req, res) => {
    try {
      const received = await state.received();
      console.log("received messages", received);
      return res.status(200).json(received);
    } catch (err) {
      console.error("Error fetching received messages", err);
      return res.status(500).json({ error: "internal error" });
    }
  });

  const control = (name: string, action: () => Promise<void> | void) => async (_req: Request, res: Response) => {
    try {
      await action();
      console.log(name);
      return res.status(200).end();
    } catch (err) {
      console.error(`Error handling ${name}`, err);
      return res.status(500).json({ error: "internal error" });
    }
  };

  app.post("/tests/set-respond-error", discardBody, control("set respond with error", () => state.armError()));
  app.post("/tests/set-respond-retry", discardBody, control("set respond with retry", () => state.armRetry()));
  app.post(
    "/tests/set-respond-empty-json",
    discardBody,
    control("set respond with empty json", () => state.armEmptyJSON())
  );
  app.post("/tests/initialize", discardBody, control("initialize received messages", () => state.initialize()));

  return app;
}
