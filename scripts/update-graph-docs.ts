import * as fs from 'fs';
import * as path from 'path';
import { app } from '../src/agents/graph';

const docFilePath = path.join(__dirname, '..', 'docs', 'agent_graph.md');
const startPlaceholder = '<!-- MERMAID_DIAGRAM_START -->';
const endPlaceholder = '<!-- MERMAID_DIAGRAM_END -->';

const nodeLabels: Record<string, string> = {
    '__start__': 'Start',
    '__end__': 'End'
};

/**
 * Renders the compiled audit graph as Mermaid flowchart syntax.
 * Conditional edges are dotted.
 */
export function toMermaid(graph: { nodes: Record<string, unknown>, edges: { source: string, target: string, conditional?: boolean }[] }): string {
    let mermaidSyntax = 'graph TD;\n';
    for (const nodeId of Object.keys(graph.nodes)) {
        mermaidSyntax += `    ${nodeId}([${nodeLabels[nodeId] || nodeId}]);\n`;
    }
    for (const edge of graph.edges) {
        const arrow = edge.conditional ? '-.->' : '-->';
        const conditionLabel = edge.conditional ? '|conditional|' : '';
        mermaidSyntax += `    ${edge.source} ${arrow}${conditionLabel} ${edge.target};\n`;
    }
    return mermaidSyntax;
}

/**
 * Replaces whatever sits between the Mermaid markers of a document.
 * @throws Error when the markers are missing or out of order.
 */
export function replaceDiagram(fileContent: string, mermaidSyntax: string): string {
    const startIndex = fileContent.indexOf(startPlaceholder);
    const endIndex = fileContent.indexOf(endPlaceholder);
    if (startIndex === -1 || endIndex === -1 || endIndex <= startIndex) {
        throw new Error(`Could not find ${startPlaceholder} and/or ${endPlaceholder} markers.`);
    }
    const preContent = fileContent.substring(0, startIndex + startPlaceholder.length);
    const postContent = fileContent.substring(endIndex);
    return `${preContent}\n\`\`\`mermaid\n${mermaidSyntax}\`\`\`\n${postContent}`;
}

if (require.main === module) {
    try {
        const mermaidSyntax = toMermaid(app.getGraph());
        console.log("Generated Mermaid Syntax:\n", mermaidSyntax);

        const fileContent = fs.readFileSync(docFilePath, 'utf-8');
        fs.writeFileSync(docFilePath, replaceDiagram(fileContent, mermaidSyntax), 'utf-8');
        console.log(`Successfully updated Mermaid diagram in ${docFilePath}`);
    } catch (error) {
        console.error("Error during script execution:", error);
        process.exit(1);
    }
}
