/**
 * Venue Seating Service entry point
 *
 * Reads configuration from the environment, seeds the default venue and starts listening.
 */

import { buildApp } from "./app";
import { loadConfig } from "./config";
import { seedData } from "./store/seed-data";

const config = loadConfig();
const app = buildApp({ config, seed: seedData });

app.listen({ port: config.port, host: config.host }).catch((err: unknown) => {
    app.log.fatal({ err }, 'failed to start');
    process.exit(1);
});
