import { format, subDays } from 'date-fns';
import { DATE_FORMAT } from '../config';
import { Facility } from './types';

const daysBefore = (now: Date, days: number) => format(subDays(now, days), DATE_FORMAT);

/**
 * Demo facilities. Calibration and inspection dates sit at fixed offsets
 * before `now` so every run shows the same overdue items:
 * EQ-PUMP-01 (400 days) and EQ-METER-05 (380 days) are past the interval.
 */
export function buildSeedFacilities(now: Date): Facility[] {
    return [
        {
            facilityId: 'FAC-AB-001',
            name: 'Edmonton South Terminal',
            location: 'Edmonton, AB',
            operator: 'PetroLab Energy',
            equipment: [
                {
                    id: 'EQ-PUMP-01',
                    type: 'Glycol Pump',
                    directiveCategory: 'Directive 017',
                    lastCalibration: daysBefore(now, 400),
                    status: 'Active',
                    criticality: 'High',
                },
                {
                    id: 'EQ-METER-04',
                    type: 'Gas Flow Meter',
                    directiveCategory: 'Directive 017',
                    lastCalibration: daysBefore(now, 120),
                    status: 'Active',
                    criticality: 'Critical',
                },
                {
                    id: 'EQ-FLARE-02',
                    type: 'Flare Stack',
                    directiveCategory: 'Directive 060',
                    lastInspection: daysBefore(now, 20),
                    status: 'Active',
                    criticality: 'High',
                },
                {
                    id: 'EQ-METER-05',
                    type: 'Differential Pressure Meter',
                    directiveCategory: 'Directive 017',
                    lastCalibration: daysBefore(now, 380),
                    status: 'Active',
                    criticality: 'High',
                },
            ],
        },
        {
            facilityId: 'FAC-AB-002',
            name: 'Calgary Processing Plant',
            location: 'Calgary, AB',
            operator: 'PetroLab Energy',
            equipment: [
                {
                    id: 'EQ-METER-10',
                    type: 'Turbine Meter',
                    directiveCategory: 'Directive 017',
                    lastCalibration: daysBefore(now, 90),
                    status: 'Active',
                    criticality: 'Critical',
                },
            ],
        },
    ];
}
