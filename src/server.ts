import { buildApp } from "./app.js";
import { loadConfig } from "./config.js";
import { logger as log } from "./logger.js";
import { createRuntime } from "./runtime.js";
import { startWorker } from "./worker.js";

const config = loadConfig();
const runtime = createRuntime(config);

const app = await buildApp(runtime);
const worker = startWorker(runtime);

async function shutdown(signal: string) {
    log.info({ signal }, "shutdown");
    await worker.close();
    await app.close();
}

for (const signal of ["SIGTERM", "SIGINT"] as const) {
    process.on(signal, () => {
        shutdown(signal).catch((err: unknown) => {
            log.error({ error: err instanceof Error ? err.message : String(err) }, "shutdown.error");
            process.exitCode = 1;
        });
    });
}

await app.ready();
log.info(app.printRoutes());
await app.listen({ port: config.port, host: "0.0.0.0" });
