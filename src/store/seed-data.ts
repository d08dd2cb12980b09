import type { VenueSeed } from "../types";

/**
 * Default venue: four rooms, nineteen tables
 */
export const seedData: VenueSeed = {
    rooms: {
        "GREENROOM": ["T1A", "T1B", "T2", "T3A", "T3B"],
        "RESTAURANT": ["T4", "T5", "T6", "T7", "T8", "T9A", "T9B"],
        "BOTTOM BAR": ["WINDOW", "BACK RIGHT", "LADS", "BLACKBOARD"],
        "SMALL FUNCTION": ["SQUARE", "OVAL", "WOODEN"]
    },
    tables: [
        { id: "T1A", capacity: 2, room: "GREENROOM" },
        { id: "T1B", capacity: 2, room: "GREENROOM" },
        { id: "T2", capacity: 4, room: "GREENROOM" },
        { id: "T3A", capacity: 6, room: "GREENROOM" },
        { id: "T3B", capacity: 4, room: "GREENROOM" },

        { id: "T4", capacity: 4, room: "RESTAURANT" },
        { id: "T5", capacity: 4, room: "RESTAURANT" },
        { id: "T6", capacity: 4, room: "RESTAURANT" },
        { id: "T7", capacity: 4, room: "RESTAURANT" },
        { id: "T8", capacity: 4, room: "RESTAURANT" },
        { id: "T9A", capacity: 2, room: "RESTAURANT" },
        { id: "T9B", capacity: 2, room: "RESTAURANT" },

        { id: "WINDOW", capacity: 6, room: "BOTTOM BAR" },
        { id: "BACK RIGHT", capacity: 2, room: "BOTTOM BAR" },
        { id: "LADS", capacity: 4, room: "BOTTOM BAR" },
        { id: "BLACKBOARD", capacity: 4, room: "BOTTOM BAR" },

        { id: "SQUARE", capacity: 2, room: "SMALL FUNCTION" },
        { id: "OVAL", capacity: 6, room: "SMALL FUNCTION" },
        { id: "WOODEN", capacity: 8, room: "SMALL FUNCTION" }
    ]
};
