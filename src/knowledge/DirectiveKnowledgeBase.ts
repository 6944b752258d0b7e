import * as fsPromises from 'fs/promises';
import * as path from 'path';
import { CollaboratorUnavailableError, errorMessage } from '../errors';
import { dbg } from '../utils';
import { IKnowledgeRetriever, RetrievalResult } from './types';

export interface DirectiveKnowledgeBaseDependencies {
    readdirFn?: (dirPath: string) => Promise<string[]>;
    readFileFn?: (filePath: string, encoding: BufferEncoding) => Promise<string>;
}

interface Passage {
    document: string;
    text: string;
    terms: Set<string>;
}

const STOP_WORDS = new Set([
    'the', 'and', 'for', 'are', 'what', 'which', 'with', 'that', 'this', 'from', 'must', 'have', 'how',
    'does', 'about', 'into', 'when', 'will', 'under', 'there', 'their', 'been', 'any', 'all',
]);

export function tokenize(text: string): string[] {
    return (text.toLowerCase().match(/[a-z0-9]+/g) ?? []).filter(t => t.length >= 3 && !STOP_WORDS.has(t));
}

/**
 * Keyword-ranked lookup over the directive text files in one directory.
 * Files (.md and .txt) are read on the first search and split into
 * paragraph passages; a passage's relevance is the share of distinct query
 * terms it contains.
 */
export class DirectiveKnowledgeBase implements IKnowledgeRetriever {
    private passages?: Passage[];
    private readonly directory: string;
    private readonly readdirFn: (dirPath: string) => Promise<string[]>;
    private readonly readFileFn: (filePath: string, encoding: BufferEncoding) => Promise<string>;

    constructor(directory: string, deps?: DirectiveKnowledgeBaseDependencies) {
        this.directory = path.resolve(directory);
        this.readdirFn = deps?.readdirFn ?? (dirPath => fsPromises.readdir(dirPath));
        this.readFileFn = deps?.readFileFn ?? fsPromises.readFile;
    }

    async search(query: string, topK: number): Promise<RetrievalResult> {
        const passages = await this.ensureLoaded();
        const queryTerms = Array.from(new Set(tokenize(query)));
        if (queryTerms.length === 0) {
            return { answer: 'The query contained no searchable terms.', sources: [] };
        }

        const ranked = passages
            .map(passage => ({
                passage,
                relevance: queryTerms.filter(term => passage.terms.has(term)).length / queryTerms.length,
            }))
            .filter(r => r.relevance > 0)
            .sort((a, b) => b.relevance - a.relevance)
            .slice(0, topK);

        dbg(`DirectiveKnowledgeBase: ${ranked.length} passage(s) matched "${query}"`);

        if (ranked.length === 0) {
            return { answer: 'No directive passages matched the query.', sources: [] };
        }
        return {
            answer: ranked.map(r => r.passage.text).join('\n\n'),
            sources: ranked.map(r => ({ document: r.passage.document, relevance: r.relevance })),
        };
    }

    private async ensureLoaded(): Promise<Passage[]> {
        if (this.passages) {
            return this.passages;
        }
        let fileNames: string[];
        try {
            fileNames = (await this.readdirFn(this.directory))
                .filter(name => name.endsWith('.md') || name.endsWith('.txt'))
                .sort();
        } catch (error) {
            throw new CollaboratorUnavailableError('Directive knowledge base', `cannot read ${this.directory}: ${errorMessage(error)}`);
        }
        if (fileNames.length === 0) {
            throw new CollaboratorUnavailableError('Directive knowledge base', `no directive files found in ${this.directory}`);
        }

        const passages: Passage[] = [];
        for (const fileName of fileNames) {
            const content = await this.readFileFn(path.join(this.directory, fileName), 'utf-8');
            for (const block of content.split(/\n\s*\n/)) {
                const text = block.trim();
                if (text && !text.startsWith('#')) {
                    passages.push({ document: fileName, text, terms: new Set(tokenize(text)) });
                }
            }
        }
        dbg(`DirectiveKnowledgeBase: loaded ${passages.length} passages from ${fileNames.length} file(s)`);
        this.passages = passages;
        return passages;
    }
}
