export type EquipmentStatus = 'Active' | 'Inactive' | 'Maintenance' | 'Decommissioned';

export type Criticality = 'Low' | 'Medium' | 'High' | 'Critical';

export interface Equipment {
    /** Unique within its facility, e.g. EQ-PUMP-01. */
    id: string;
    type: string;
    /** Directive the item is regulated under, e.g. "Directive 017". */
    directiveCategory: string;
    status: EquipmentStatus;
    /** Calendar date (yyyy-MM-dd). Only items carrying it are subject to the calibration rule. */
    lastCalibration?: string;
    /** Calendar date (yyyy-MM-dd) for inspection-only equipment. */
    lastInspection?: string;
    criticality?: Criticality;
}

export interface FacilitySummary {
    facilityId: string;
    name: string;
    location: string;
    operator: string;
}

export interface Facility extends FacilitySummary {
    equipment: Equipment[];
}

export interface FacilityInfo extends FacilitySummary {
    equipmentCount: number;
}

export interface EmailRecord {
    id: string;
    to: string;
    cc: string[];
    subject: string;
    body: string;
    sentAt: string;
    status: 'sent';
}

export interface ScheduledTask {
    id: string;
    task: string;
    /** Calendar date (yyyy-MM-dd), no time component. */
    scheduledDate: string;
    facilityId?: string;
    createdAt: string;
    status: 'scheduled';
}

export interface MaintenanceLogEntry {
    id: string;
    equipmentId: string;
    action: string;
    notes: string;
    loggedAt: string;
    loggedBy: 'agent';
}

export interface StatusSummary {
    facilities: number;
    tasks: number;
    emails: number;
    logs: number;
}
