import express, { ErrorRequestHandler, Request, RequestHandler } from "express";
import { GameRuleError } from "../engine/types";
import { Logger } from "./logger";
import { AvalonService } from "./service";
import {
  RequestError,
  isRecord,
  optionalString,
  parseMissionVote,
  parseResetPayload,
  parseTeamVote,
  requireString,
  requireStringArray
} from "./validation";

function bodyOf(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  if (body === undefined) return {};
  if (!isRecord(body)) {
    throw new RequestError("Request body must be a JSON object");
  }
  return body;
}

/**
 * Express app exposing one route per game operation under /avalon.
 * Rule violations come back as 400 with a machine-readable code; the handlers
 * themselves are synchronous, so Express routes thrown errors to the error handler.
 */
export function createHttpApp(service: AvalonService, logger: Logger) {
  const app = express();
  app.use(express.json());

  /** Liveness check for load balancers. */
  app.get("/health", (_req, res) => {
    res.json({ status: "ok", phase: service.current().phase, timestamp: Date.now() });
  });

  const router = express.Router();

  router.post("/reset_game", (req, res) => {
    const result = service.reset(parseResetPayload(req.body));
    res.json({ status: "ok", previousPlayers: result.previousPlayers });
  });

  router.post("/clear_game", (_req, res) => {
    service.clear();
    res.json({ status: "ok" });
  });

  router.post("/end_game", (_req, res) => {
    service.endGame();
    res.json({ status: "ok" });
  });

  router.get("/lobby", (_req, res) => {
    res.json(service.lobby());
  });

  router.post("/join", (req, res) => {
    const status = service.join(requireString(bodyOf(req), "playerName"));
    res.json({ status });
  });

  const propose: RequestHandler = (req, res) => {
    const body = bodyOf(req);
    const { requiredSize } = service.proposeTeam(requireStringArray(body, "team"), optionalString(body, "playerName"));
    res.json({ status: "ok", requiredSize });
  };
  router.post("/propose_team", propose);
  router.post("/start_mission", propose);

  router.post("/record_vote_fail", (_req, res) => {
    service.recordVoteFail();
    res.json({ status: "ok" });
  });

  router.post("/vote_team", (req, res) => {
    const body = bodyOf(req);
    const status = service.voteTeam(requireString(body, "playerName"), parseTeamVote(body["vote"]));
    res.json({ status });
  });

  router.post("/vote_mission", (req, res) => {
    const body = bodyOf(req);
    const status = service.voteMission(requireString(body, "playerName"), parseMissionVote(body["action"]));
    res.json({ status });
  });

  router.post("/assign_excalibur", (req, res) => {
    service.assignExcalibur(requireString(bodyOf(req), "target"));
    res.json({ status: "ok" });
  });

  router.post("/use_excalibur", (req, res) => {
    const excaliburResult = service.useExcalibur(optionalString(bodyOf(req), "target"));
    res.json({ status: "ok", excaliburResult });
  });

  router.post("/lady_of_lake", (req, res) => {
    const alignment = service.inspectWithLady(requireString(bodyOf(req), "target"));
    res.json({ status: "ok", alignment });
  });

  router.post("/assassinate", (req, res) => {
    const winner = service.assassinate(requireString(bodyOf(req), "target"));
    res.json({ status: "ok", winner });
  });

  /** Redacted snapshot for one viewer; the name is not authenticated. */
  router.get("/status/:playerName", (req, res) => {
    res.json(service.view(req.params.playerName));
  });

  router.get("/leaderboard", (_req, res, next) => {
    service
      .leaderboard()
      .then(leaderboard => res.json({ leaderboard }))
      .catch(next);
  });

  app.use("/avalon", router);

  const handleError: ErrorRequestHandler = (err, _req, res, _next) => {
    if (err instanceof GameRuleError) {
      res.status(400).json({ error: { code: err.code, message: err.message } });
      return;
    }
    if (err instanceof RequestError) {
      res.status(400).json({ error: { code: err.code, message: err.message } });
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: { code: "BAD_JSON", message: "Invalid JSON payload" } });
      return;
    }
    logger.error("Unhandled request error", { err });
    res.status(500).json({ error: { code: "SERVER_ERROR", message: "Internal error" } });
  };
  app.use(handleError);

  return app;
}
