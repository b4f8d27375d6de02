import http from "http";
import { loadConfig } from "./config";
import { createHttpApp } from "./http";
import { createConsoleLogger } from "./logger";
import { InMemoryResultsRecorder } from "./results";
import { AvalonService } from "./service";
import { SessionStore } from "./store";
import { WebSocketGateway } from "./ws";

// Bootstrap that wires the single session store to HTTP + WebSocket layers.

const logger = createConsoleLogger("avalon");
const config = loadConfig(process.env, logger);

const service = new AvalonService({
  store: new SessionStore(),
  recorder: new InMemoryResultsRecorder(),
  logger,
  config
});

const app = createHttpApp(service, logger);
const server = http.createServer(app);

const gateway = new WebSocketGateway(service, logger);
gateway.attach(server);

server.listen(config.port, () => {
  logger.info(`Avalon server running on port ${config.port}`);
  logger.info("Health check: GET /health");
});
