import { z } from 'zod';
import { isCalendarDate } from '../dates';

const requiredText = (description: string) => z.string().trim().min(1, 'must not be empty').describe(description);

export const listFacilitiesSchema = z.object({});

export const facilitySchema = z.object({
    facility_id: requiredText('The ID of the facility to audit (e.g., FAC-AB-001)'),
});

export const directiveQuerySchema = z.object({
    query: requiredText('Question about directive requirements'),
});

export const complianceReportSchema = z.object({
    recipient: requiredText('Email address of the compliance officer'),
    subject: requiredText('Subject line of the email'),
    body: requiredText('Full text content of the compliance report'),
    cc: z.array(z.string()).nullish().describe('CC recipients'),
});

export const followUpSchema = z.object({
    task: requiredText('Task description for the scheduled item'),
    date: z
        .string()
        .refine(isCalendarDate, 'must be a calendar date in YYYY-MM-DD format')
        .describe('Date for follow-up in YYYY-MM-DD format'),
    facility_id: z.string().nullish().describe('Associated facility ID'),
});

export const maintenanceLogSchema = z.object({
    equipment_id: requiredText('Equipment ID'),
    action: requiredText('Maintenance action taken'),
    notes: z.string().describe('Additional notes'),
});

