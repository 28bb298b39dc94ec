import "reflect-metadata";
import express, { NextFunction, Request, Response } from "express";
import multer from "multer";
import { AppDataSource } from "./db/data-source";
import { sessionRoutes } from "./routes/sessions";
import { logger } from "./config/logger";
import { getSettings } from "./config/settings";
import { ValidationError, normalizeError } from "./errors/interview-errors";
import { getQueueConfig } from "./queue/queue-config";
import { responseAnalysisProcessor } from "./workers/response-worker";
import { getOpenAIService } from "./services/openai.service";

const settings = getSettings();
const app = express();

// Middleware
app.use(express.json());
app.use(express.urlencoded({ extended: true }));

// Routes
app.use("/sessions", sessionRoutes);

// Health check
app.get("/health", (req: Request, res: Response) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
});

// Errors raised before a route handler runs (body parsing, uploads)
app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
        return next(err);
    }
    const appError = normalizeError(err instanceof multer.MulterError ? new ValidationError(err.message) : err);
    logger.warn({ path: req.path, error: appError.message, code: appError.code }, 'Request rejected by middleware');
    res.status(appError.statusCode).json(appError.toJSON());
});

// Initialize database and start server
async function startServer() {
    // Initialize database connection
    await AppDataSource.initialize();
    logger.info({}, "Database connection established");

    // Check the model provider; the interview still runs on fallbacks without it
    const openaiConnected = await getOpenAIService().testConnection();
    if (openaiConnected) {
        logger.info({}, "OpenAI service initialized and connected");
    } else {
        logger.warn({}, "OpenAI service initialized but connection test failed");
    }

    // Initialize queue system
    const queueConfig = getQueueConfig();
    queueConfig.startWorker(responseAnalysisProcessor);
    logger.info({ concurrency: settings.RESPONSE_WORKER_CONCURRENCY }, "Queue system initialized and worker started");

    const server = app.listen(settings.PORT, () => {
        logger.info({ port: settings.PORT }, `Server running at http://localhost:${settings.PORT}`);
    });

    const shutdown = (signal: string) => {
        logger.info({ signal }, "Shutting down");
        server.close();
        queueConfig.close()
            .then(() => AppDataSource.destroy())
            .then(() => process.exit(0))
            .catch(error => {
                logger.error({ error: String(error) }, "Shutdown failed");
                process.exit(1);
            });
    };
    process.once("SIGTERM", () => shutdown("SIGTERM"));
    process.once("SIGINT", () => shutdown("SIGINT"));
}

startServer().catch(error => {
    logger.error({ err: error }, "Failed to start server");
    process.exit(1);
});
