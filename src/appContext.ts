import { DEFAULT_DIRECTIVES_DIR, DIRECTIVE_SEARCH_TIMEOUT_MS } from './config';
import { DirectiveKnowledgeBase } from './knowledge/DirectiveKnowledgeBase';
import { IKnowledgeRetriever } from './knowledge/types';
import { MockOperationalStore } from './store/MockOperationalStore';
import { buildSeedFacilities } from './store/seed';
import { createAuditToolRegistry } from './tools/auditTools';
import { ToolRegistry } from './tools/ToolRegistry';

export interface AuditAppContext {
    store: MockOperationalStore;
    toolRegistry: ToolRegistry;
}

export interface AuditAppOptions {
    directivesDir?: string;
    /** Overrides the directive corpus; pass null to run without directive search. */
    retriever?: IKnowledgeRetriever | null;
    now?: () => Date;
    searchTimeoutMs?: number;
}

/**
 * Wires a seeded store and the audit tool registry together. Each call
 * returns an independent store, so sessions or tests never share records
 * unless they share the context.
 */
export function createAuditAppContext(options: AuditAppOptions = {}): AuditAppContext {
    const now = options.now ?? (() => new Date());
    const store = new MockOperationalStore(buildSeedFacilities(now()), now);
    const retriever = options.retriever === undefined
        ? new DirectiveKnowledgeBase(options.directivesDir ?? DEFAULT_DIRECTIVES_DIR)
        : options.retriever ?? undefined;
    const toolRegistry = createAuditToolRegistry({
        store,
        retriever,
        now,
        searchTimeoutMs: options.searchTimeoutMs ?? DIRECTIVE_SEARCH_TIMEOUT_MS,
    });
    return { store, toolRegistry };
}
