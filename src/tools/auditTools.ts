import { format } from 'date-fns';
import { CalibrationComplianceResult, evaluateCalibrationCompliance } from '../compliance/calibration';
import { DATE_FORMAT, DIRECTIVE_SEARCH_TOP_K, DIRECTIVE_SOURCES_SHOWN } from '../config';
import { errorMessage } from '../errors';
import { RetrievalResult } from '../knowledge/types';
import { Equipment } from '../store/types';
import { withTimeout } from '../utils';
import { ToolRegistry } from './ToolRegistry';
import {
    complianceReportSchema,
    directiveQuerySchema,
    facilitySchema,
    followUpSchema,
    listFacilitiesSchema,
    maintenanceLogSchema,
} from './schemas';
import { defineTool, ToolContext } from './types';

export const FALLBACK_DIRECTIVE_GUIDANCE =
    'AER Directive 017 requires gas metering equipment to be calibrated/proved at least once every 365 days. ' +
    'Temperature and pressure compensation devices must be calibrated according to manufacturer specifications.';

const noEquipmentText = (facilityId: string) => `No equipment found for facility ID: ${facilityId}`;

function facilityHeading(context: ToolContext, facilityId: string): string {
    const info = context.store.getFacilityInfo(facilityId);
    return info ? `${facilityId} (${info.name})` : facilityId;
}

function formatEquipment(item: Equipment): string {
    const lines = [
        `- ID: ${item.id}`,
        `  Type: ${item.type}`,
        `  Directive: ${item.directiveCategory}`,
        `  Status: ${item.status}`,
    ];
    if (item.lastCalibration) lines.push(`  Last Calibration: ${item.lastCalibration}`);
    if (item.lastInspection) lines.push(`  Last Inspection: ${item.lastInspection}`);
    if (item.criticality) lines.push(`  Criticality: ${item.criticality}`);
    return lines.join('\n');
}

export function formatComplianceReport(heading: string, asOf: Date, result: CalibrationComplianceResult): string {
    const lines = [`Calibration Compliance Report for ${heading}`, `Date: ${format(asOf, DATE_FORMAT)}`, ''];
    const { nonCompliant, compliant } = result;

    if (nonCompliant.length === 0 && compliant.length === 0) {
        lines.push('No equipment at this facility carries a calibration date.');
        return lines.join('\n');
    }

    if (nonCompliant.length > 0) {
        lines.push('NON-COMPLIANT EQUIPMENT (exceeds 365-day requirement):');
        for (const f of nonCompliant) {
            lines.push(
                `- ${f.type} (ID: ${f.equipmentId})`,
                `  Last Calibrated: ${f.lastCalibration} (${f.daysSinceCalibration} days ago)`,
                `  Days Overdue: ${f.daysOverdue}`,
                `  Criticality: ${f.criticality ?? 'Unknown'}`
            );
        }
        lines.push(`Total Non-Compliant: ${nonCompliant.length} items`);
    } else {
        lines.push('ALL EQUIPMENT IS COMPLIANT');
    }

    if (compliant.length > 0) {
        lines.push('', `Compliant Equipment (${compliant.length} items):`);
        for (const f of compliant) {
            lines.push(`- ${f.type} (ID: ${f.equipmentId}): compliant (${f.daysSinceCalibration} days)`);
        }
    }
    return lines.join('\n');
}

function formatDirectiveGuidance(result: RetrievalResult): string {
    const lines = ['Directive Guidance:', '', result.answer];
    const shown = result.sources.slice(0, DIRECTIVE_SOURCES_SHOWN);
    if (shown.length > 0) {
        lines.push('', 'Sources:');
        shown.forEach((source, i) => lines.push(`  ${i + 1}. ${source.document} (Relevance: ${source.relevance.toFixed(2)})`));
    }
    return lines.join('\n');
}

export const listFacilitiesTool = defineTool({
    name: 'list_facilities',
    description: 'Get a list of all available facilities that can be audited.',
    schema: listFacilitiesSchema,
    async run(_input, context) {
        const facilities = context.store.listFacilities();
        if (facilities.length === 0) {
            return { text: 'No facilities found in the system.', data: facilities };
        }
        const lines = facilities.map(f => `- ${f.facilityId}: ${f.name} (${f.location})`);
        return { text: ['Available Facilities:', ...lines].join('\n'), data: facilities };
    },
});

export const getFacilityEquipmentTool = defineTool({
    name: 'get_facility_equipment',
    description: 'Fetch the complete list of equipment for a specific facility to check against directives.',
    schema: facilitySchema,
    async run({ facility_id }, context) {
        const equipment = context.store.getEquipment(facility_id);
        if (equipment.length === 0) {
            return { text: noEquipmentText(facility_id), data: equipment };
        }
        const text = [`Equipment at ${facilityHeading(context, facility_id)}:`, ...equipment.map(formatEquipment)].join('\n\n');
        return { text, data: equipment };
    },
});

export const checkCalibrationComplianceTool = defineTool({
    name: 'check_calibration_compliance',
    description:
        'Checks equipment calibration dates against the 365-day requirement from Directive 017. ' +
        'Returns the non-compliant items with days overdue, followed by the compliant items.',
    schema: facilitySchema,
    async run({ facility_id }, context) {
        const equipment = context.store.getEquipment(facility_id);
        if (equipment.length === 0) {
            return { text: noEquipmentText(facility_id) };
        }
        const now = context.now();
        const result = evaluateCalibrationCompliance(equipment, now);
        return { text: formatComplianceReport(facilityHeading(context, facility_id), now, result), data: result };
    },
});

export const searchDirectivesTool = defineTool({
    name: 'search_directives',
    description:
        'Searches the directive knowledge base for specific requirements, procedures, or technical specifications. ' +
        'Use this to find authoritative guidance from the directives.',
    schema: directiveQuerySchema,
    async run({ query }, context) {
        if (!context.retriever) {
            return { text: `${FALLBACK_DIRECTIVE_GUIDANCE} (Note: directive search is not configured.)` };
        }
        try {
            const result = await withTimeout(
                context.retriever.search(query, DIRECTIVE_SEARCH_TOP_K),
                context.searchTimeoutMs,
                'Directive search'
            );
            return { text: formatDirectiveGuidance(result), data: result };
        } catch (error) {
            console.warn(`search_directives: falling back to built-in guidance: ${errorMessage(error)}`);
            return { text: `${FALLBACK_DIRECTIVE_GUIDANCE} (Note: full directive search unavailable: ${errorMessage(error)})` };
        }
    },
});

export const sendComplianceReportTool = defineTool({
    name: 'send_compliance_report',
    description:
        'Sends the final audit report via email to the compliance officer. ' +
        'Use this after completing an audit to notify stakeholders.',
    schema: complianceReportSchema,
    async run({ recipient, subject, body, cc }, context) {
        const emailId = context.store.sendEmail(recipient, subject, body, cc ?? []);
        return { text: `Report emailed successfully to ${recipient}. Email ID: ${emailId}`, data: { emailId } };
    },
});

export const scheduleFollowUpTool = defineTool({
    name: 'schedule_follow_up',
    description:
        'Schedule a follow-up audit, maintenance task, or inspection in the calendar system. ' +
        'Date must be in YYYY-MM-DD format.',
    schema: followUpSchema,
    async run({ task, date, facility_id }, context) {
        const confirmationId = context.store.scheduleTask(task, date, facility_id ?? undefined);
        return {
            text: `Follow-up scheduled: ${task} on ${date}. Confirmation ID: ${confirmationId}`,
            data: { confirmationId },
        };
    },
});

export const logMaintenanceActionTool = defineTool({
    name: 'log_maintenance_action',
    description: 'Log a maintenance action for equipment. Use this to create audit trails for maintenance activities.',
    schema: maintenanceLogSchema,
    async run({ equipment_id, action, notes }, context) {
        const logId = context.store.logMaintenance(equipment_id, action, notes);
        return { text: `Maintenance logged for ${equipment_id}. Log ID: ${logId}`, data: { logId } };
    },
});

/**
 * Registry holding the seven audit tools, bound to one store and retriever.
 */
export function createAuditToolRegistry(context: ToolContext): ToolRegistry {
    return new ToolRegistry(context)
        .register(listFacilitiesTool)
        .register(getFacilityEquipmentTool)
        .register(checkCalibrationComplianceTool)
        .register(searchDirectivesTool)
        .register(sendComplianceReportTool)
        .register(scheduleFollowUpTool)
        .register(logMaintenanceActionTool);
}
