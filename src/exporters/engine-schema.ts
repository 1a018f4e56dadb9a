import type { FacilityKind } from '../types/index.js';

/**
 * Room categories, cheapest first. Examinations of a symptom are emitted in
 * this order so the engine tries office checks before lab work or imaging.
 */
export type RoomCategory = 'office' | 'observation' | 'lab' | 'imaging';

export const ROOM_CATEGORY_RANK: Record<RoomCategory, number> = {
    office: 0,
    observation: 1,
    lab: 2,
    imaging: 3,
};

export interface RoomSpec {
    /** Value of the engine's `RequiredRoomTags/Tag` */
    roomTag: string;
    category: RoomCategory;
}

/**
 * Facilities the engine can build, keyed by facility kind.
 */
export const ENGINE_ROOMS: Record<FacilityKind, RoomSpec> = {
    DoctorOffice: { roomTag: 'examinations_no_equipment', category: 'office' },
    Observation: { roomTag: 'observation_room', category: 'observation' },
    Ward: { roomTag: 'ward', category: 'observation' },
    IntensiveCare: { roomTag: 'icu', category: 'observation' },
    Lab: { roomTag: 'clinical_lab', category: 'lab' },
    Radiology: { roomTag: 'radiology_unit', category: 'imaging' },
    SpecialistUnit: { roomTag: 'specialist_unit', category: 'imaging' },
    OperatingRoom: { roomTag: 'operating_room', category: 'imaging' },
};

/** Engine value of `GameDBTreatment/Type` */
export const TREATMENT_TYPES = {
    Surgical: 'SURGERY',
    NonSurgical: 'MEDICATION',
} as const;

/**
 * Look up the engine room for a facility, or undefined when the engine
 * has no such room.
 */
export function roomFor(facility: string): RoomSpec | undefined {
    return Object.entries(ENGINE_ROOMS).find(([kind]) => kind === facility)?.[1];
}
