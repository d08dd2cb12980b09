import { z } from 'zod';

/**
 * Validation schema for POST /venue/tables request body
 */
export const CreateTableSchema = z.object({
    /** Base table id; "+" is reserved for combined tables */
    id: z.string().min(1).refine(id => !id.includes('+'), { message: "Table id must not contain '+'" }),
    capacity: z.number().int().positive(),
    room: z.string().min(1),
});

/**
 * Validation schema for route parameters naming a table
 */
export const TableParamsSchema = z.object({
    id: z.string().min(1),
});

/**
 * Validation schema for route parameters naming a group (automatically coerced from string)
 */
export const GroupParamsSchema = z.object({
    id: z.coerce.number().int().positive(),
});

/**
 * Validation schema for POST /venue/groups request body
 */
export const CreateGroupSchema = z.object({
    /** Number of guests */
    size: z.number().int().positive(),
    /** Optional display name (defaults to "Group {id}") */
    name: z.string().optional(),
});

/**
 * Validation schema for PATCH /venue/groups/:id request body
 */
export const RenameGroupSchema = z.object({
    name: z.string().min(1),
});

/**
 * Validation schema for POST /venue/groups/:id/seat request body
 *
 * Without a tableId the engine picks the table (combining tables if needed).
 */
export const SeatGroupSchema = z.object({
    tableId: z.string().min(1).optional(),
}).default({});

/**
 * Validation schema for GET /venue/groups query parameters
 */
export const ListGroupsQuerySchema = z.object({
    status: z.enum(['all', 'waiting']).default('all'),
});

/**
 * Validation schema for GET /venue/status query parameters
 */
export const StatusQuerySchema = z.object({
    format: z.enum(['json', 'text']).default('json'),
});
