import { NodeClass } from 'node-opcua';
import type { AddressSpace, NodeSummary, Reporter } from '../types';

export interface FakeNode {
    nodeId: string;
    browseName: string;
    nodeClass: NodeClass;
    children?: FakeNode[];
    methods?: FakeNode[];
    value?: unknown;
    valueError?: string;
    dataType?: string;
    dataTypeError?: string;
    accessLevel?: number | null;
    browseError?: string;
}

export const OBJECTS_ID = 'i=85';

function summarize(node: FakeNode): NodeSummary {
    return { nodeId: node.nodeId, browseName: node.browseName, nodeClass: node.nodeClass };
}

/**
 * In-memory address space rooted at an Objects folder. A node object may
 * appear under several parents to model shared references and cycles.
 */
export class FakeAddressSpace implements AddressSpace {
    readonly objectsFolderId = OBJECTS_ID;
    readonly browsed: string[] = [];
    private readonly nodes = new Map<string, FakeNode>();

    constructor(objects: FakeNode[]) {
        this.index({
            nodeId: OBJECTS_ID,
            browseName: 'Objects',
            nodeClass: NodeClass.Object,
            children: objects,
        });
    }

    async readSummary(nodeId: string): Promise<NodeSummary> {
        return summarize(this.get(nodeId));
    }

    async browseMethods(nodeId: string): Promise<NodeSummary[]> {
        return (this.get(nodeId).methods ?? []).map(summarize);
    }

    async browseChildren(nodeId: string): Promise<NodeSummary[]> {
        const node = this.get(nodeId);
        this.browsed.push(nodeId);
        if (node.browseError) {
            throw new Error(node.browseError);
        }
        return (node.children ?? []).map(summarize);
    }

    async readAccessLevel(nodeId: string): Promise<number | null> {
        return this.get(nodeId).accessLevel ?? null;
    }

    async readDataTypeName(nodeId: string): Promise<string> {
        const node = this.get(nodeId);
        if (node.dataTypeError) {
            throw new Error(node.dataTypeError);
        }
        return node.dataType ?? 'BaseDataType';
    }

    async readValue(nodeId: string): Promise<unknown> {
        const node = this.get(nodeId);
        if (node.valueError) {
            throw new Error(node.valueError);
        }
        return node.value;
    }

    private get(nodeId: string): FakeNode {
        const node = this.nodes.get(nodeId);
        if (!node) {
            throw new Error(`BadNodeIdUnknown: ${nodeId}`);
        }
        return node;
    }

    private index(node: FakeNode): void {
        if (this.nodes.has(node.nodeId)) {
            return;
        }
        this.nodes.set(node.nodeId, node);
        for (const child of [...(node.methods ?? []), ...(node.children ?? [])]) {
            this.index(child);
        }
    }
}

export interface RecordedLine {
    level: 'log' | 'warn' | 'error';
    message: string;
}

export class RecordingReporter implements Reporter {
    readonly lines: RecordedLine[] = [];

    log(message: string): void {
        this.lines.push({ level: 'log', message });
    }

    warn(message: string): void {
        this.lines.push({ level: 'warn', message });
    }

    error(message: string): void {
        this.lines.push({ level: 'error', message });
    }

    get messages(): string[] {
        return this.lines.map((line) => line.message);
    }
}
