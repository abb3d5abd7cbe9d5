import { bootstrap } from "../../../libs/bootstrap/startup.js";
import { loadSettings } from "../../../libs/bootstrap/settings.js";
import { GracefulShutdown, serviceShutdownSteps } from "../../../libs/bootstrap/shutdown.js";
import { createApp } from "../../../libs/http/app.js";
import { logger } from "../../../libs/logging/logger.js";

const SHUTDOWN_TIMEOUT_MS = 30_000;
const DRAIN_TIMEOUT_MS = 20_000;

async function main() {
    const settings = loadSettings();
    const container = await bootstrap("analysis-api", settings);

    const app = createApp({
        orchestrator: container.orchestrator,
        health: container.health,
        auth: settings.auth,
        corsOrigins: settings.corsOrigins
    });

    const server = app.listen(settings.port, () => {
        logger.info({ port: settings.port, instanceId: container.instanceId }, "Analysis API listening");
    });

    const shutdown = new GracefulShutdown(
        serviceShutdownSteps(server, container, DRAIN_TIMEOUT_MS),
        { timeoutMs: SHUTDOWN_TIMEOUT_MS }
    );

    const stop = (reason: string, exitCode: number) => {
        shutdown.shutdown(reason).then(
            clean => process.exit(clean ? exitCode : 1),
            (error: unknown) => {
                logger.fatal({ error }, "Shutdown failed");
                process.exit(1);
            }
        );
    };

    process.on("SIGTERM", () => stop("SIGTERM", 0));
    process.on("SIGINT", () => stop("SIGINT", 0));
    process.on("unhandledRejection", reason => {
        logger.fatal({ reason }, "Unhandled rejection");
        stop("unhandledRejection", 1);
    });
}

main().catch((error: unknown) => {
    logger.fatal({ error }, "Analysis API failed to start");
    process.exit(1);
});
