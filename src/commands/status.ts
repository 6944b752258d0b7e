import { format } from 'date-fns';
import { MockOperationalStore } from '../store/MockOperationalStore';

/**
 * Text block with the current record counts, as shown by `status`.
 */
export function formatStatusSummary(store: MockOperationalStore, now: Date = new Date()): string {
    const { facilities, tasks, emails, logs } = store.getStatusSummary();
    return [
        'System Status',
        `Last Updated: ${format(now, 'yyyy-MM-dd HH:mm:ss')}`,
        `Active Facilities: ${facilities}`,
        `Scheduled Tasks: ${tasks}`,
        `Emails Sent: ${emails}`,
        `Maintenance Logs: ${logs}`,
    ].join('\n');
}
