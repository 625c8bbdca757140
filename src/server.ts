import app from "./app";
import { config } from "./config";
import { closeMongo, initMongo } from "./config/mongo";

async function start() {
    await initMongo();
    const server = app.listen(config.port, () => {
        console.log(`Server listening on http://localhost:${config.port}`);
    });

    const shutdown = (signal: string) => {
        console.log("[Server] shutting down", { signal });
        server.close(() => {
            closeMongo()
                .then(() => process.exit(0))
                .catch((error) => {
                    console.error("[Server] mongo disconnect failed", error);
                    process.exit(1);
                });
        });
    };
    process.on("SIGTERM", () => shutdown("SIGTERM"));
    process.on("SIGINT", () => shutdown("SIGINT"));
}

start().catch((error) => {
    console.error("Failed to start server", error);
    process.exit(1);
});
