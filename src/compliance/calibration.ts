import { differenceInDays } from 'date-fns';
import { CALIBRATION_INTERVAL_DAYS } from '../config';
import { parseCalendarDate } from '../dates';
import { Criticality, Equipment } from '../store/types';

export interface ComplianceFinding {
    equipmentId: string;
    type: string;
    lastCalibration: string;
    daysSinceCalibration: number;
    /** 0 when compliant. */
    daysOverdue: number;
    criticality?: Criticality;
}

export interface CalibrationComplianceResult {
    nonCompliant: ComplianceFinding[];
    compliant: ComplianceFinding[];
}

/**
 * Classifies equipment against the maximum calibration interval as of `now`.
 *
 * Days since calibration are whole days from local midnight of the calibration
 * date to `now`, rounded down. An item is non-compliant only when that count is
 * strictly greater than the interval, so exactly 365 days is still compliant.
 * Items with no calibration date (inspection-only equipment) or an unparseable
 * one are left out of both groups. Input order is kept within each group.
 */
export function evaluateCalibrationCompliance(
    equipment: readonly Equipment[],
    now: Date,
    intervalDays: number = CALIBRATION_INTERVAL_DAYS
): CalibrationComplianceResult {
    const result: CalibrationComplianceResult = { nonCompliant: [], compliant: [] };

    for (const item of equipment) {
        if (item.lastCalibration === undefined) {
            continue;
        }
        const calibratedOn = parseCalendarDate(item.lastCalibration);
        if (!calibratedOn) {
            continue;
        }

        const daysSinceCalibration = differenceInDays(now, calibratedOn);
        const overdue = daysSinceCalibration > intervalDays;
        const finding: ComplianceFinding = {
            equipmentId: item.id,
            type: item.type,
            lastCalibration: item.lastCalibration,
            daysSinceCalibration,
            daysOverdue: overdue ? daysSinceCalibration - intervalDays : 0,
            criticality: item.criticality,
        };
        (overdue ? result.nonCompliant : result.compliant).push(finding);
    }

    return result;
}
