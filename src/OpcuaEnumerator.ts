import { NodeClass } from 'node-opcua';
import { accessLevelLabel, errorMessage, formatValue, nodeClassName } from './opcua/opcua-helpers';
import type { AccessLabel, AddressSpace, NodeSummary, Reporter } from './types';

/**
 * Walks an OPC UA address space depth-first and prints one line per node,
 * indented two spaces per level.
 */
export class OpcuaEnumerator {
    constructor(
        private readonly addressSpace: AddressSpace,
        private readonly reporter: Reporter = console,
    ) {}

    /**
     * Prints `node` and everything below it. Nothing is printed for nodes
     * deeper than `maxDepth`; without a limit the whole subtree is walked.
     * Errors on a single node are reported and do not stop the walk.
     *
     * `ancestors` holds the nodes on the path from the walk's root. A node
     * reached again below itself is marked and not descended into; a node
     * shared by two parents is listed under both.
     */
    async browseNode(
        node: NodeSummary,
        depth = 0,
        maxDepth?: number,
        ancestors: Set<string> = new Set<string>(),
    ): Promise<void> {
        if (maxDepth !== undefined && depth > maxDepth) {
            return;
        }

        const indent = '  '.repeat(depth);
        try {
            const className = nodeClassName(node.nodeClass);
            const heading = `${indent}- ${node.browseName} (${className}) | NodeId: ${node.nodeId}`;

            if (ancestors.has(node.nodeId)) {
                this.reporter.log(`${heading} | already listed`);
                return;
            }

            if (node.nodeClass === NodeClass.Variable) {
                const access = await this.describeAccess(node.nodeId);
                const dataType = await this.describeDataType(node.nodeId);
                this.reporter.log(`${heading} | DataType: ${dataType} | Access: ${access}`);
                try {
                    const value = await this.addressSpace.readValue(node.nodeId);
                    this.reporter.log(`${indent}  Value: ${formatValue(value)}`);
                } catch (err) {
                    this.reporter.warn(`${indent}  Could not read value: ${errorMessage(err)}`);
                }
            } else {
                this.reporter.log(heading);
            }

            if (maxDepth !== undefined && depth + 1 > maxDepth) {
                return;
            }
            ancestors.add(node.nodeId);
            try {
                for (const method of await this.addressSpace.browseMethods(node.nodeId)) {
                    await this.browseNode(method, depth + 1, maxDepth, ancestors);
                }
                for (const child of await this.addressSpace.browseChildren(node.nodeId)) {
                    await this.browseNode(child, depth + 1, maxDepth, ancestors);
                }
            } finally {
                ancestors.delete(node.nodeId);
            }
        } catch (err) {
            this.reporter.error(`${indent}Error browsing node: ${errorMessage(err)}`);
        }
    }

    async browseAll(): Promise<void> {
        this.reporter.log('Browsing all from root...');
        const objects = await this.addressSpace.readSummary(this.addressSpace.objectsFolderId);
        await this.browseNode(objects);
    }

    /**
     * Lists the children of the Objects folder, each down to `maxDepth`
     * levels below it (0 lists the children only).
     */
    async enumerateObjects(maxDepth: number): Promise<void> {
        this.reporter.log(`Enumerating Objects (depth ${maxDepth}):`);
        const children = await this.addressSpace.browseChildren(this.addressSpace.objectsFolderId);
        for (const child of children) {
            await this.browseNode(child, 0, maxDepth);
        }
    }

    /**
     * Walks one object, given either as a NodeId or as the browse name of a
     * direct child of Objects. Returns false when no such node exists.
     */
    async showObject(nodeIdOrName: string): Promise<boolean> {
        let target: NodeSummary | null;
        try {
            target = await this.resolveObject(nodeIdOrName);
        } catch (err) {
            this.reporter.error(`Could not browse node '${nodeIdOrName}': ${errorMessage(err)}`);
            return false;
        }

        if (!target) {
            this.reporter.error(`Object '${nodeIdOrName}' not found.`);
            return false;
        }

        this.reporter.log(`Browsing object: ${target.browseName} | NodeId: ${target.nodeId}`);
        await this.browseNode(target);
        return true;
    }

    private async resolveObject(nodeIdOrName: string): Promise<NodeSummary | null> {
        const direct = await this.addressSpace.readSummary(nodeIdOrName).catch(() => null);
        if (direct) {
            return direct;
        }
        // not a NodeId of this server: match a browse name under Objects
        const children = await this.addressSpace.browseChildren(this.addressSpace.objectsFolderId);
        return children.find((child) => child.browseName === nodeIdOrName) ?? null;
    }

    private async describeAccess(nodeId: string): Promise<AccessLabel> {
        try {
            return accessLevelLabel(await this.addressSpace.readAccessLevel(nodeId));
        } catch {
            return 'Unknown';
        }
    }

    private async describeDataType(nodeId: string): Promise<string> {
        try {
            return await this.addressSpace.readDataTypeName(nodeId);
        } catch (err) {
            return `Unknown type (${errorMessage(err)})`;
        }
    }
}
