import { expect } from 'chai';
import sinon from 'sinon';
import { describe, it, beforeEach, afterEach } from 'mocha';
import { createAuditToolRegistry, FALLBACK_DIRECTIVE_GUIDANCE } from '../src/tools/auditTools';
import { ToolRegistry } from '../src/tools/ToolRegistry';
import { MockOperationalStore } from '../src/store/MockOperationalStore';
import { buildSeedFacilities } from '../src/store/seed';
import { IKnowledgeRetriever, RetrievalResult } from '../src/knowledge/types';
import { CollaboratorUnavailableError, SchemaValidationError } from '../src/errors';
import { withTimeout } from '../src/utils';
import { clock, NOW, rejectionOf, stubConsole } from './helpers';

const ALL_TOOLS = [
    'list_facilities',
    'get_facility_equipment',
    'check_calibration_compliance',
    'search_directives',
    'send_compliance_report',
    'schedule_follow_up',
    'log_maintenance_action',
];

class StubRetriever implements IKnowledgeRetriever {
    readonly search = sinon.stub<[string, number], Promise<RetrievalResult>>();
}

describe('Audit tools', () => {
    let store: MockOperationalStore;
    let retriever: StubRetriever;
    let registry: ToolRegistry;
    let consoleStubs: ReturnType<typeof stubConsole>;

    beforeEach(() => {
        consoleStubs = stubConsole();
        store = new MockOperationalStore(buildSeedFacilities(NOW), clock);
        retriever = new StubRetriever();
        registry = createAuditToolRegistry({ store, retriever, now: clock, searchTimeoutMs: 50 });
    });

    afterEach(() => {
        sinon.restore();
    });

    it('registers the seven audit tools', () => {
        expect(registry.names()).to.deep.equal(ALL_TOOLS);
    });

    it('describes each tool with a JSON schema of its parameters', () => {
        const specs = registry.toToolSpecs();
        const followUp = specs.find(s => s.name === 'schedule_follow_up');
        expect(followUp?.parameters.type).to.equal('object');
        expect(followUp?.parameters.required).to.deep.equal(['task', 'date']);
        expect(followUp?.parameters).to.not.have.property('$schema');
        const list = specs.find(s => s.name === 'list_facilities');
        expect(list?.parameters.properties).to.deep.equal({});
    });

    describe('list_facilities', () => {
        it('lists facilities one per line', async () => {
            const { text } = await registry.invoke('list_facilities', {});
            expect(text).to.equal([
                'Available Facilities:',
                '- FAC-AB-001: Edmonton South Terminal (Edmonton, AB)',
                '- FAC-AB-002: Calgary Processing Plant (Calgary, AB)',
            ].join('\n'));
        });

        it('says so when there are no facilities', async () => {
            const empty = createAuditToolRegistry({ store: new MockOperationalStore([], clock), now: clock, searchTimeoutMs: 50 });
            const { text } = await empty.invoke('list_facilities', {});
            expect(text).to.equal('No facilities found in the system.');
        });
    });

    describe('get_facility_equipment', () => {
        it('prints each item with its optional fields', async () => {
            const { text } = await registry.invoke('get_facility_equipment', { facility_id: 'FAC-AB-002' });
            expect(text).to.equal([
                'Equipment at FAC-AB-002 (Calgary Processing Plant):',
                '',
                '- ID: EQ-METER-10',
                '  Type: Turbine Meter',
                '  Directive: Directive 017',
                '  Status: Active',
                '  Last Calibration: 2024-10-22',
                '  Criticality: Critical',
            ].join('\n'));
        });

        it('reports an unknown facility as having no equipment', async () => {
            const { text, data } = await registry.invoke('get_facility_equipment', { facility_id: 'FAC-XX-999' });
            expect(text).to.equal('No equipment found for facility ID: FAC-XX-999');
            expect(data).to.deep.equal([]);
        });

        it('trims the facility id', async () => {
            const { text } = await registry.invoke('get_facility_equipment', { facility_id: '  FAC-AB-002 ' });
            expect(text.split('\n')[0]).to.equal('Equipment at FAC-AB-002 (Calgary Processing Plant):');
        });
    });

    describe('check_calibration_compliance', () => {
        it('reports overdue items first, then compliant ones', async () => {
            const { text } = await registry.invoke('check_calibration_compliance', { facility_id: 'FAC-AB-001' });
            expect(text).to.equal([
                'Calibration Compliance Report for FAC-AB-001 (Edmonton South Terminal)',
                'Date: 2025-01-20',
                '',
                'NON-COMPLIANT EQUIPMENT (exceeds 365-day requirement):',
                '- Glycol Pump (ID: EQ-PUMP-01)',
                '  Last Calibrated: 2023-12-17 (400 days ago)',
                '  Days Overdue: 35',
                '  Criticality: High',
                '- Differential Pressure Meter (ID: EQ-METER-05)',
                '  Last Calibrated: 2024-01-06 (380 days ago)',
                '  Days Overdue: 15',
                '  Criticality: High',
                'Total Non-Compliant: 2 items',
                '',
                'Compliant Equipment (1 items):',
                '- Gas Flow Meter (ID: EQ-METER-04): compliant (120 days)',
            ].join('\n'));
        });

        it('states when everything is compliant', async () => {
            const { text } = await registry.invoke('check_calibration_compliance', { facility_id: 'FAC-AB-002' });
            expect(text).to.equal([
                'Calibration Compliance Report for FAC-AB-002 (Calgary Processing Plant)',
                'Date: 2025-01-20',
                '',
                'ALL EQUIPMENT IS COMPLIANT',
                '',
                'Compliant Equipment (1 items):',
                '- Turbine Meter (ID: EQ-METER-10): compliant (90 days)',
            ].join('\n'));
        });

        it('notes a facility whose equipment carries no calibration dates', async () => {
            const inspectionOnly = new MockOperationalStore([{
                facilityId: 'FAC-T-1', name: 'Flare Site', location: 'Red Deer, AB', operator: 'Op',
                equipment: [{ id: 'EQ-F', type: 'Flare Stack', directiveCategory: 'Directive 060', status: 'Active', lastInspection: '2025-01-01' }],
            }], clock);
            const local = createAuditToolRegistry({ store: inspectionOnly, now: clock, searchTimeoutMs: 50 });
            const { text } = await local.invoke('check_calibration_compliance', { facility_id: 'FAC-T-1' });
            expect(text).to.equal([
                'Calibration Compliance Report for FAC-T-1 (Flare Site)',
                'Date: 2025-01-20',
                '',
                'No equipment at this facility carries a calibration date.',
            ].join('\n'));
        });

        it('reports an unknown facility as having no equipment', async () => {
            const { text } = await registry.invoke('check_calibration_compliance', { facility_id: 'FAC-XX-999' });
            expect(text).to.equal('No equipment found for facility ID: FAC-XX-999');
        });
    });

    describe('search_directives', () => {
        it('shows the answer and the top two sources', async () => {
            retriever.search.resolves({
                answer: 'Meters are proved every 365 days.',
                sources: [
                    { document: 'directive-017.md', relevance: 1 },
                    { document: 'directive-060.md', relevance: 0.5 },
                    { document: 'notes.md', relevance: 0.25 },
                ],
            });
            const { text } = await registry.invoke('search_directives', { query: 'meter proving interval' });
            expect(retriever.search.calledOnceWith('meter proving interval', 3)).to.be.true;
            expect(text).to.equal([
                'Directive Guidance:',
                '',
                'Meters are proved every 365 days.',
                '',
                'Sources:',
                '  1. directive-017.md (Relevance: 1.00)',
                '  2. directive-060.md (Relevance: 0.50)',
            ].join('\n'));
        });

        it('falls back to built-in guidance when the retriever fails', async () => {
            retriever.search.rejects(new Error('index offline'));
            const { text } = await registry.invoke('search_directives', { query: 'calibration' });
            expect(text).to.equal(`${FALLBACK_DIRECTIVE_GUIDANCE} (Note: full directive search unavailable: index offline)`);
            expect(consoleStubs.warn.calledOnce).to.be.true;
        });

        it('falls back when the retriever does not answer in time', async () => {
            retriever.search.returns(new Promise<RetrievalResult>(() => undefined));
            const { text } = await registry.invoke('search_directives', { query: 'calibration' });
            expect(text).to.equal(`${FALLBACK_DIRECTIVE_GUIDANCE} (Note: full directive search unavailable: Directive search unavailable: timed out after 50ms)`);
        });

        it('reports a timed-out search as an unavailable collaborator', async () => {
            const error = await rejectionOf(withTimeout(new Promise<void>(() => undefined), 20, 'Directive search'));
            expect(error).to.be.instanceOf(CollaboratorUnavailableError);
            expect(error.message).to.equal('Directive search unavailable: timed out after 20ms');
        });

        it('uses the built-in guidance when no retriever is configured', async () => {
            const local = createAuditToolRegistry({ store, now: clock, searchTimeoutMs: 50 });
            const { text } = await local.invoke('search_directives', { query: 'calibration' });
            expect(text).to.equal(`${FALLBACK_DIRECTIVE_GUIDANCE} (Note: directive search is not configured.)`);
        });
    });

    describe('send_compliance_report', () => {
        it('records the email and returns its id', async () => {
            const { text } = await registry.invoke('send_compliance_report', {
                recipient: 'safety@example.com',
                subject: 'FAC-AB-001 audit',
                body: 'Two items overdue.',
                cc: ['ops@example.com'],
            });
            expect(text).to.equal('Report emailed successfully to safety@example.com. Email ID: EMAIL-1000');
            expect(store.getEmails()[0].cc).to.deep.equal(['ops@example.com']);
        });

        it('accepts a null cc', async () => {
            await registry.invoke('send_compliance_report', { recipient: 'a@example.com', subject: 's', body: 'b', cc: null });
            expect(store.getEmails()[0].cc).to.deep.equal([]);
        });

        it('rejects a missing recipient without sending anything', async () => {
            const error = await rejectionOf(registry.invoke('send_compliance_report', { subject: 's', body: 'b' }));
            expect(error).to.be.instanceOf(SchemaValidationError);
            expect(error.message).to.equal("Invalid input for tool 'send_compliance_report': field 'recipient' is required");
            expect(store.getEmails()).to.deep.equal([]);
        });

        it('rejects a blank subject', async () => {
            const error = await rejectionOf(registry.invoke('send_compliance_report', { recipient: 'a@example.com', subject: '   ', body: 'b' }));
            expect(error.message).to.equal("Invalid input for tool 'send_compliance_report': field 'subject' must not be empty");
        });
    });

    describe('schedule_follow_up', () => {
        it('schedules a task and returns the confirmation id', async () => {
            const { text } = await registry.invoke('schedule_follow_up', {
                task: 'Recalibrate EQ-PUMP-01',
                date: '2025-02-01',
                facility_id: 'FAC-AB-001',
            });
            expect(text).to.equal('Follow-up scheduled: Recalibrate EQ-PUMP-01 on 2025-02-01. Confirmation ID: CAL-1000');
            expect(store.getTasks()[0].facilityId).to.equal('FAC-AB-001');
        });

        it('rejects a malformed date and leaves the calendar untouched', async () => {
            const error = await rejectionOf(registry.invoke('schedule_follow_up', { task: 'Recalibrate', date: '2025-13-45' }));
            expect(error).to.be.instanceOf(SchemaValidationError);
            expect(error.message).to.equal("Invalid input for tool 'schedule_follow_up': field 'date' must be a calendar date in YYYY-MM-DD format");
            expect(store.getTasks()).to.deep.equal([]);
        });

        it('treats a null facility id as none', async () => {
            await registry.invoke('schedule_follow_up', { task: 'Walkdown', date: '2025-02-01', facility_id: null });
            expect(store.getTasks()[0]).to.not.have.property('facilityId');
        });
    });

    describe('log_maintenance_action', () => {
        it('logs the action and returns the log id', async () => {
            const { text } = await registry.invoke('log_maintenance_action', {
                equipment_id: 'EQ-PUMP-01',
                action: 'Calibration scheduled',
                notes: '',
            });
            expect(text).to.equal('Maintenance logged for EQ-PUMP-01. Log ID: MAINT-1000');
        });

        it('requires notes', async () => {
            const error = await rejectionOf(registry.invoke('log_maintenance_action', { equipment_id: 'EQ-PUMP-01', action: 'a' }));
            expect(error.message).to.equal("Invalid input for tool 'log_maintenance_action': field 'notes' is required");
            expect(store.getLogs()).to.deep.equal([]);
        });
    });
});
