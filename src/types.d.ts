/**
 * Room catalog: room name -> base table ids that live in it
 *
 * Static reference data, only used for reverse lookups and for the set of valid room names.
 */
export type RoomCatalogSeed = Record<string, string[]>;

/**
 * Table roster entry used to seed the venue at startup
 */
export interface TableSeed {
    id: string;
    capacity: number;
    room: string;
}

/**
 * Seed data structure for initializing the engine
 */
export interface VenueSeed {
    rooms: RoomCatalogSeed;
    tables: TableSeed[];
}

/**
 * Physical table
 *
 * While a combination holds it, `occupied` is true and `combinedInto` names the combination.
 */
export interface BaseTable {
    kind: 'base';
    id: string;
    capacity: number;
    room: string;
    occupied: boolean;
    combinedInto: string | null;
}

/**
 * Virtual table synthesized from empty base tables in one room
 *
 * Exists only while it has (or is about to receive) occupants.
 */
export interface CombinedTable {
    kind: 'combined';
    /** Component ids joined with `+`, in selection order */
    id: string;
    /** Sum of component capacities */
    capacity: number;
    room: string;
    occupied: boolean;
    componentTables: string[];
}

export type Table = BaseTable | CombinedTable;

export interface WaitingGroup {
    id: number;
    name: string;
    size: number;
}

export interface SeatedGroup {
    id: number;
    name: string;
    size: number;
    tableId: string;
    /** ISO datetime string */
    seatedAt: string;
}

export type GroupStatus = 'Waiting' | 'Seated';

/**
 * Group as reported by `allGroups()`
 */
export interface GroupListing {
    id: number;
    name: string;
    size: number;
    status: GroupStatus;
    tableId: string | null;
    seatedAt: string | null;
    /** Whole minutes since seating, null while waiting */
    seatedMinutes: number | null;
}

/**
 * Result of seating a group, one per group seated by `optimize()`
 */
export interface Placement {
    groupId: number;
    tableId: string;
    combined: boolean;
    /** Base tables behind a combined table; empty for single tables */
    componentTables: string[];
}

export interface Occupant {
    id: number;
    name: string;
    size: number;
}

/**
 * One row of the table status report
 */
export interface TableStatusRow {
    id: string;
    kind: Table['kind'];
    room: string;
    capacity: number;
    occupied: boolean;
    combinedInto: string | null;
    componentTables: string[];
    occupants: Occupant[];
    occupancy: number;
    utilizationPct: number;
}

export interface VenueSnapshot {
    overallUtilization: number;
    tables: TableStatusRow[];
    waiting: WaitingGroup[];
}

export type FailureCategory = 'NotFound' | 'CapacityViolation' | 'DuplicateEntity' | 'InvalidInput';

export type FailureKind =
    | 'TableNotFound'
    | 'GroupNotFound'
    | 'UnknownRoom'
    | 'GroupTooLarge'
    | 'InsufficientSpace'
    | 'TableUnavailable'
    | 'NoTableAvailable'
    | 'DuplicateTable'
    | 'InvalidInput';

/**
 * Rejected engine command. The engine state is unchanged when one is returned.
 */
export interface Failure {
    ok: false;
    kind: FailureKind;
    category: FailureCategory;
    message: string;
}

export interface Success<T> {
    ok: true;
    value: T;
}

export type Outcome<T> = Success<T> | Failure;
