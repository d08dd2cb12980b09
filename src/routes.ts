import type { FastifyReply, FastifyRequest } from 'fastify';
import {
    CreateGroupSchema,
    CreateTableSchema,
    GroupParamsSchema,
    ListGroupsQuerySchema,
    RenameGroupSchema,
    SeatGroupSchema,
    StatusQuerySchema,
    TableParamsSchema
} from './schemas';
import { FAILURES } from './domain/errors';
import type { Failure } from './types';

/**
 * Send an engine failure with the status and error code of its kind
 */
const sendFailure = (reply: FastifyReply, failure: Failure) => {
    const { statusCode, code } = FAILURES[failure.kind];
    return reply.status(statusCode).send({ error: code, detail: failure.message });
}

/**
 * Venue status snapshot
 *
 * @param request - Fastify request with query parameters:
 *   - format: "json" (default) or "text" for one status line per table and waiting group
 * @returns Overall utilization, table rows and waiting groups
 *
 * @throws {400} Invalid input
 */
export const status = async (request: FastifyRequest, reply: FastifyReply) => {
    const query = StatusQuerySchema.safeParse(request.query);
    if (!query.success) {
        return reply.status(400).send({ error: 'invalid_input', detail: query.error.format() });
    }
    const { engine } = request.server.store;

    if (query.data.format === 'text') {
        return reply.type('text/plain').send(engine.statusLines().join('\n'));
    }
    return engine.snapshot();
}

/**
 * List every table (base and combined) with its occupants and utilization, sorted by id
 */
export const listTables = async (request: FastifyRequest) => {
    return { items: request.server.store.engine.tableStatus() };
}

/**
 * Add a base table
 *
 * @param request - Fastify request with body { id, capacity, room }
 * @returns Created table
 *
 * @throws {400} Invalid input or unknown room
 * @throws {409} A table with this id already exists
 */
export const createTable = async (request: FastifyRequest, reply: FastifyReply) => {
    const body = CreateTableSchema.safeParse(request.body);
    if (!body.success) {
        return reply.status(400).send({ error: 'invalid_input', detail: body.error.format() });
    }
    const { id, capacity, room } = body.data;

    const outcome = request.server.store.engine.addTable(id, capacity, room);
    if (!outcome.ok) return sendFailure(reply, outcome);

    request.log.info({ tableId: id, capacity, room }, 'table added');
    return reply.status(201).send(outcome.value);
}

/**
 * Remove a table; groups seated there go back to the waiting list
 *
 * @returns Removed table id and the ids of re-queued groups
 *
 * @throws {404} Table not found
 */
export const deleteTable = async (request: FastifyRequest, reply: FastifyReply) => {
    const params = TableParamsSchema.safeParse(request.params);
    if (!params.success) {
        return reply.status(400).send({ error: 'invalid_input', detail: params.error.format() });
    }

    const outcome = request.server.store.engine.removeTable(params.data.id);
    if (!outcome.ok) return sendFailure(reply, outcome);

    request.log.info(outcome.value, 'table removed');
    return outcome.value;
}

/**
 * List groups
 *
 * @param request - Fastify request with query parameters:
 *   - status: "all" (default, waiting then seated) or "waiting"
 */
export const listGroups = async (request: FastifyRequest, reply: FastifyReply) => {
    const query = ListGroupsQuerySchema.safeParse(request.query);
    if (!query.success) {
        return reply.status(400).send({ error: 'invalid_input', detail: query.error.format() });
    }
    const { engine } = request.server.store;
    const items = query.data.status === 'waiting' ? engine.waitingGroups() : engine.allGroups();
    return { items };
}

/**
 * Add a group of guests to the waiting list
 *
 * Supports the Idempotency-Key header: a repeated key replays the original creation response,
 * the group as it was when created, even if it has been renamed, seated or released since.
 *
 * @param request - Fastify request with:
 *   - headers.idempotency-key: Optional unique key for idempotent requests
 *   - body: { size, name? }
 * @returns Created group with its id
 *
 * @throws {200} Idempotent request - returns existing group
 * @throws {400} Invalid input
 */
export const createGroup = async (request: FastifyRequest, reply: FastifyReply) => {
    const { store } = request.server;
    const header = request.headers['idempotency-key'];
    const idempotencyKey = typeof header === 'string' && header.length > 0 ? header : undefined;
    if (idempotencyKey) {
        const existing = store.getIdempotency(idempotencyKey);
        if (existing) return reply.status(200).send(existing);
    }

    const body = CreateGroupSchema.safeParse(request.body);
    if (!body.success) {
        return reply.status(400).send({ error: 'invalid_input', detail: body.error.format() });
    }

    const outcome = store.engine.addGroup(body.data.size, body.data.name);
    if (!outcome.ok) return sendFailure(reply, outcome);

    if (idempotencyKey) {
        store.setIdempotency(idempotencyKey, outcome.value);
    }
    request.log.info({ groupId: outcome.value.id, size: outcome.value.size }, 'group added');
    return reply.status(201).send(outcome.value);
}

/**
 * Rename a waiting or seated group
 *
 * @throws {400} Invalid input
 * @throws {404} Group not found
 */
export const renameGroup = async (request: FastifyRequest, reply: FastifyReply) => {
    const params = GroupParamsSchema.safeParse(request.params);
    const body = RenameGroupSchema.safeParse(request.body);
    if (!params.success) {
        return reply.status(400).send({ error: 'invalid_input', detail: params.error.format() });
    }
    if (!body.success) {
        return reply.status(400).send({ error: 'invalid_input', detail: body.error.format() });
    }

    const outcome = request.server.store.engine.rename(params.data.id, body.data.name);
    if (!outcome.ok) return sendFailure(reply, outcome);
    return outcome.value;
}

/**
 * Seat a waiting group
 *
 * With a tableId in the body the group goes to that table (sharing it if there is room).
 * Without one the engine picks a free table, combining tables in one room when needed.
 *
 * @returns Placement: { groupId, tableId, combined, componentTables }
 *
 * @throws {400} Invalid input
 * @throws {404} Table or group not found
 * @throws {409} Group too large, not enough space, table held by a combination, or no capacity
 */
export const seatGroup = async (request: FastifyRequest, reply: FastifyReply) => {
    const params = GroupParamsSchema.safeParse(request.params);
    const body = SeatGroupSchema.safeParse(request.body);
    if (!params.success) {
        return reply.status(400).send({ error: 'invalid_input', detail: params.error.format() });
    }
    if (!body.success) {
        return reply.status(400).send({ error: 'invalid_input', detail: body.error.format() });
    }

    const { engine } = request.server.store;
    const { tableId } = body.data;
    const outcome = tableId === undefined
        ? engine.seatAnywhere(params.data.id)
        : engine.seat(params.data.id, tableId);
    if (!outcome.ok) return sendFailure(reply, outcome);

    request.log.info(outcome.value, 'group seated');
    return outcome.value;
}

/**
 * Mark a seated group as left
 *
 * The group is removed. The last group leaving a combined table splits it back into its tables.
 *
 * @returns 204 No Content on success
 *
 * @throws {404} Group not found or not seated
 */
export const releaseGroup = async (request: FastifyRequest, reply: FastifyReply) => {
    const params = GroupParamsSchema.safeParse(request.params);
    if (!params.success) {
        return reply.status(400).send({ error: 'invalid_input', detail: params.error.format() });
    }

    const outcome = request.server.store.engine.release(params.data.id);
    if (!outcome.ok) return sendFailure(reply, outcome);

    request.log.info(outcome.value, 'group left');
    return reply.status(204).send();
}

/**
 * Seat every waiting group that fits, largest first
 *
 * @returns Placements for the groups seated by this run
 */
export const optimize = async (request: FastifyRequest) => {
    const placements = request.server.store.engine.optimize();
    request.log.info({ seated: placements.length }, 'seating optimized');
    return { placements };
}

/**
 * Utilization percentages: overall (every table record), seats (each physical seat once) and per table
 */
export const utilization = async (request: FastifyRequest) => {
    const { engine } = request.server.store;
    return {
        overall: engine.overallUtilization(),
        seats: engine.seatUtilization(),
        tables: engine.tableStatus().map(row => ({ id: row.id, utilizationPct: row.utilizationPct }))
    };
}
