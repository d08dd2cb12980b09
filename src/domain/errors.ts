import type { Failure, FailureCategory, FailureKind, Success } from '../types';

interface FailureSpec {
    category: FailureCategory;
    /** Error code sent to API clients */
    code: string;
    statusCode: number;
}

export const FAILURES = {
    TableNotFound: { category: 'NotFound', code: 'table_not_found', statusCode: 404 },
    GroupNotFound: { category: 'NotFound', code: 'group_not_found', statusCode: 404 },
    UnknownRoom: { category: 'NotFound', code: 'unknown_room', statusCode: 400 },
    GroupTooLarge: { category: 'CapacityViolation', code: 'group_too_large', statusCode: 409 },
    InsufficientSpace: { category: 'CapacityViolation', code: 'insufficient_space', statusCode: 409 },
    TableUnavailable: { category: 'CapacityViolation', code: 'table_unavailable', statusCode: 409 },
    NoTableAvailable: { category: 'CapacityViolation', code: 'no_capacity', statusCode: 409 },
    DuplicateTable: { category: 'DuplicateEntity', code: 'duplicate_table', statusCode: 409 },
    InvalidInput: { category: 'InvalidInput', code: 'invalid_input', statusCode: 400 },
} as const satisfies Record<FailureKind, FailureSpec>;

export const fail = (kind: FailureKind, message: string): Failure => ({
    ok: false,
    kind,
    category: FAILURES[kind].category,
    message
});

export const succeed = <T>(value: T): Success<T> => ({ ok: true, value });

export const isPositiveInteger = (value: number): boolean => Number.isInteger(value) && value > 0;
