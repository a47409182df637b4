import "dotenv/config";
import express from "express";
import cors from "cors";
import { loadPipelineConfig, PORT } from "./config";
import { logger } from "./lib/logger";
import { createPipelineContext } from "./modules/pipeline/context";
import { createPriceRouter } from "./modules/pipeline/router";

/**
 * Точка входа API: JSON-парсер, CORS и маршруты цен под /api.
 */
const config = loadPipelineConfig();
const ctx = createPipelineContext(config);

const app = express();
app.use(cors());
app.use(express.json({ limit: "16kb" }));

app.use("/api", createPriceRouter(ctx));

app.listen(PORT, () => logger.info({ port: PORT, cacheDir: config.cacheDir }, "API running"));
