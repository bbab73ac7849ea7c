import "dotenv/config";
import express from "express";
import { createServer } from "http";
import { createChordSegmentationRouter } from "./chord-segmentation-api";
import { loadChordConfig } from "./chord/config";
import { logger } from "./logger";

const app = express();
const server = createServer(app);

// Requests carry paths only; volumes are read from disk
app.use(express.json({ limit: '1mb' }));
app.use('/api', createChordSegmentationRouter());

async function startServer() {
  const { port } = loadChordConfig();
  await new Promise<void>((resolve) => server.listen(port, "0.0.0.0", resolve));
  logger.info(`🚀 Server running on port ${port}`, 'server');
}

startServer().catch((error: unknown) => {
  logger.error(error instanceof Error ? error : String(error), 'server');
  process.exitCode = 1;
});
