import { isCalendarDate } from '../dates';
import { ValidationError } from '../errors';
import { dbg, say } from '../utils';
import {
    EmailRecord,
    Equipment,
    EquipmentStatus,
    Facility,
    FacilityInfo,
    FacilitySummary,
    MaintenanceLogEntry,
    ScheduledTask,
    StatusSummary,
} from './types';

type Clock = () => Date;

const ID_SEQUENCE_START = 1000;
const EMAIL_PREVIEW_LENGTH = 200;

/**
 * In-memory stand-in for the facility, email, calendar and maintenance APIs.
 *
 * Facility and equipment data is reference data supplied at construction.
 * Emails, scheduled tasks and maintenance logs are append-only and are the only
 * thing `reset()` clears. Id counters survive a reset so an id is never handed out twice.
 *
 * Every mutating method validates its input before touching state and runs
 * synchronously, so a failed call leaves nothing behind and concurrent sessions
 * sharing one store never interleave inside an append.
 */
export class MockOperationalStore {
    private readonly facilities: Map<string, Facility>;
    private readonly clock: Clock;

    private emails: EmailRecord[] = [];
    private tasks: ScheduledTask[] = [];
    private logs: MaintenanceLogEntry[] = [];

    private nextEmailSeq = ID_SEQUENCE_START;
    private nextTaskSeq = ID_SEQUENCE_START;
    private nextLogSeq = ID_SEQUENCE_START;

    /**
     * @param facilities - Reference data. Deep-copied; later changes to the argument do not leak in.
     * @param clock - Source of record timestamps. Defaults to wall-clock time.
     */
    constructor(facilities: Facility[] = [], clock: Clock = () => new Date()) {
        this.clock = clock;
        this.facilities = new Map(
            facilities.map(f => [f.facilityId, { ...f, equipment: f.equipment.map(e => ({ ...e })) }])
        );
    }

    listFacilities(): FacilitySummary[] {
        return Array.from(this.facilities.values()).map(({ facilityId, name, location, operator }) => ({
            facilityId,
            name,
            location,
            operator,
        }));
    }

    /**
     * Equipment for a facility, in seed order. An unknown facility id yields an
     * empty list, the same as a facility with no equipment.
     */
    getEquipment(facilityId: string): Equipment[] {
        const facility = this.facilities.get(facilityId);
        return facility ? facility.equipment.map(e => ({ ...e })) : [];
    }

    getFacilityInfo(facilityId: string): FacilityInfo | undefined {
        const facility = this.facilities.get(facilityId);
        if (!facility) {
            return undefined;
        }
        const { name, location, operator, equipment } = facility;
        return { facilityId, name, location, operator, equipmentCount: equipment.length };
    }

    sendEmail(to: string, subject: string, body: string, cc: string[] = []): string {
        const record: EmailRecord = {
            id: `EMAIL-${this.nextEmailSeq++}`,
            to,
            cc: [...cc],
            subject,
            body,
            sentAt: this.clock().toISOString(),
            status: 'sent',
        };
        this.emails.push(record);

        say(`[MOCK EMAIL SENT] ${record.id} to ${to}${cc.length > 0 ? ` (cc: ${cc.join(', ')})` : ''}`);
        say(`Subject: ${subject}`);
        dbg(`Body preview: ${body.substring(0, EMAIL_PREVIEW_LENGTH)}${body.length > EMAIL_PREVIEW_LENGTH ? '...' : ''}`);

        return record.id;
    }

    /**
     * @throws ValidationError when `date` is not a yyyy-MM-dd calendar date. Nothing is appended.
     */
    scheduleTask(task: string, date: string, facilityId?: string): string {
        if (!isCalendarDate(date)) {
            throw new ValidationError('date', `Invalid date '${date}': expected a calendar date in YYYY-MM-DD format.`);
        }
        const entry: ScheduledTask = {
            id: `CAL-${this.nextTaskSeq++}`,
            task,
            scheduledDate: date,
            createdAt: this.clock().toISOString(),
            status: 'scheduled',
        };
        if (facilityId !== undefined) {
            entry.facilityId = facilityId;
        }
        this.tasks.push(entry);
        dbg(`MockOperationalStore: scheduled ${entry.id} for ${date}`);
        return entry.id;
    }

    /** The equipment id is recorded as given; it is not checked against the facilities. */
    logMaintenance(equipmentId: string, action: string, notes: string): string {
        const entry: MaintenanceLogEntry = {
            id: `MAINT-${this.nextLogSeq++}`,
            equipmentId,
            action,
            notes,
            loggedAt: this.clock().toISOString(),
            loggedBy: 'agent',
        };
        this.logs.push(entry);
        dbg(`MockOperationalStore: logged ${entry.id} for ${equipmentId}`);
        return entry.id;
    }

    /** Returns false when no facility holds the equipment. */
    updateEquipmentStatus(equipmentId: string, status: EquipmentStatus): boolean {
        for (const facility of this.facilities.values()) {
            const item = facility.equipment.find(e => e.id === equipmentId);
            if (item) {
                item.status = status;
                dbg(`MockOperationalStore: ${equipmentId} status set to ${status}`);
                return true;
            }
        }
        return false;
    }

    reset(): void {
        this.emails = [];
        this.tasks = [];
        this.logs = [];
        dbg('MockOperationalStore: emails, tasks and maintenance logs cleared.');
    }

    getEmails(): EmailRecord[] {
        return this.emails.map(e => ({ ...e, cc: [...e.cc] }));
    }

    getTasks(): ScheduledTask[] {
        return this.tasks.map(t => ({ ...t }));
    }

    getLogs(): MaintenanceLogEntry[] {
        return this.logs.map(l => ({ ...l }));
    }

    getStatusSummary(): StatusSummary {
        return {
            facilities: this.facilities.size,
            tasks: this.tasks.length,
            emails: this.emails.length,
            logs: this.logs.length,
        };
    }
}
