export interface RetrievalSource {
    document: string;
    /** 0..1, higher is more relevant. */
    relevance: number;
}

export interface RetrievalResult {
    answer: string;
    sources: RetrievalSource[];
}

/**
 * Anything that can answer a question from the directive corpus.
 * Callers treat the result as opaque text plus source attributions.
 */
export interface IKnowledgeRetriever {
    search(query: string, topK: number): Promise<RetrievalResult>;
}
