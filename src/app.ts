/**
 * Venue Seating Service
 *
 * Builds the Fastify app around one seating engine.
 *
 * Features:
 * - Fastify web server with pretty logging
 * - Rate limiting (configurable, 100 requests per minute by default)
 * - RESTful API endpoints under /venue prefix
 * - In-memory engine seeded with the venue's rooms and tables
 */

import fastify, { type FastifyError, type FastifyServerOptions } from "fastify";
import rateLimit from '@fastify/rate-limit';
import {
    status,
    listTables,
    createTable,
    deleteTable,
    listGroups,
    createGroup,
    renameGroup,
    seatGroup,
    releaseGroup,
    optimize,
    utilization
} from "./routes";
import type { AppConfig } from "./config";
import { VenueStore } from "./store/db";
import type { VenueSeed } from "./types";

declare module 'fastify' {
    interface FastifyInstance {
        store: VenueStore;
    }
}

export interface BuildAppOptions {
    config: AppConfig;
    seed: VenueSeed;
    /** Overrides the logger derived from config (tests pass false) */
    logger?: FastifyServerOptions['logger'];
    /** Clock for seating timestamps */
    now?: () => Date;
}

const loggerFor = (config: AppConfig): FastifyServerOptions['logger'] => {
    if (!config.logPretty) return { level: config.logLevel };
    return {
        level: config.logLevel,
        transport: {
            target: "pino-pretty",
            options: {
                colorize: true,
                ignore: "pid,hostname",
                translateTime: "SYS:dd-mm-yyyy HH:MM:ss"
            }
        }
    };
}

export function buildApp({ config, seed, logger, now }: BuildAppOptions) {
    const app = fastify({ logger: logger ?? loggerFor(config) });

    const store = new VenueStore(seed, { now, idempotencyTtlMs: config.idempotencyTtlMs });
    app.decorate('store', store);
    app.addHook('onClose', async () => {
        store.close();
    });

    app.setErrorHandler((error: FastifyError, request, reply) => {
        const statusCode = error.statusCode !== undefined && error.statusCode >= 400 ? error.statusCode : 500;
        if (statusCode >= 500) {
            request.log.error({ err: error }, 'request failed');
            return reply.status(statusCode).send({ error: 'internal_error' });
        }
        return reply.status(statusCode).send({ error: 'request_error', detail: error.message });
    });

    app.register(rateLimit, {
        max: config.rateLimit.max,
        timeWindow: config.rateLimit.timeWindow
    });

    app.register(function (app, _, done) {
        app.get("/status", status);
        app.get("/tables", listTables);
        app.post("/tables", createTable);
        app.delete("/tables/:id", deleteTable);
        app.get("/groups", listGroups);
        app.post("/groups", createGroup);
        app.patch("/groups/:id", renameGroup);
        app.post("/groups/:id/seat", seatGroup);
        app.delete("/groups/:id", releaseGroup);
        app.post("/optimize", optimize);
        app.get("/utilization", utilization);

        done();
    }, { prefix: "/venue" });

    return app;
}
