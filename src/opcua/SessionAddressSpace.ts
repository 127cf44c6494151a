import {
    AttributeIds,
    BrowseDescriptionLike,
    BrowseDirection,
    BrowseResult,
    DataType,
    DataValue,
    LocalizedText,
    NodeClass,
    NodeId,
    ObjectIds,
    QualifiedName,
    ReadValueIdOptions,
    ReferenceDescription,
    ReferenceTypeIds,
    makeNodeId,
    resolveNodeId,
} from 'node-opcua';
import type { AddressSpace, NodeSummary } from '../types';
import { widenInt64 } from './opcua-helpers';

const RESULT_MASK_ALL = 63;

/**
 * The three session services the enumerator uses. A node-opcua
 * `ClientSession` satisfies it.
 */
export interface BrowsingSession {
    browse(nodeToBrowse: BrowseDescriptionLike): Promise<BrowseResult>;
    browseNext(continuationPoints: Buffer[], releaseContinuationPoints: boolean): Promise<BrowseResult[]>;
    read(nodesToRead: ReadValueIdOptions[]): Promise<DataValue[]>;
}

function toSummary(reference: ReferenceDescription): NodeSummary {
    return {
        nodeId: reference.nodeId.toString(),
        browseName: reference.browseName.name ?? '',
        nodeClass: reference.nodeClass,
    };
}

function statusError(what: string, dataValue: DataValue): Error {
    return new Error(`${what}: ${dataValue.statusCode.toString()}`);
}

export class SessionAddressSpace implements AddressSpace {
    readonly objectsFolderId = makeNodeId(ObjectIds.ObjectsFolder).toString();

    constructor(private readonly session: BrowsingSession) {}

    async readSummary(nodeId: string): Promise<NodeSummary> {
        const resolved = resolveNodeId(nodeId);
        const [nodeClassValue, browseNameValue] = await this.session.read([
            { nodeId: resolved, attributeId: AttributeIds.NodeClass },
            { nodeId: resolved, attributeId: AttributeIds.BrowseName },
        ]);
        if (browseNameValue.statusCode.isNotGood()) {
            throw statusError(`Cannot read BrowseName of ${nodeId}`, browseNameValue);
        }
        const browseName: unknown = browseNameValue.value.value;
        const nodeClass: unknown = nodeClassValue.value.value;
        return {
            nodeId: resolved.toString(),
            browseName: browseName instanceof QualifiedName ? browseName.name ?? '' : String(browseName),
            nodeClass: typeof nodeClass === 'number' ? nodeClass : NodeClass.Unspecified,
        };
    }

    async browseChildren(nodeId: string): Promise<NodeSummary[]> {
        const references = await this.browseAll({
            nodeId: resolveNodeId(nodeId),
            browseDirection: BrowseDirection.Forward,
            referenceTypeId: ReferenceTypeIds.HierarchicalReferences,
            includeSubtypes: true,
            nodeClassMask: 0,
            resultMask: RESULT_MASK_ALL,
        });
        return references.filter((node) => node.nodeClass !== NodeClass.Method);
    }

    async browseMethods(nodeId: string): Promise<NodeSummary[]> {
        const references = await this.browseAll({
            nodeId: resolveNodeId(nodeId),
            browseDirection: BrowseDirection.Forward,
            referenceTypeId: ReferenceTypeIds.HasComponent,
            includeSubtypes: true,
            nodeClassMask: NodeClass.Method,
            resultMask: RESULT_MASK_ALL,
        });
        return references.filter((node) => node.nodeClass === NodeClass.Method);
    }

    async readAccessLevel(nodeId: string): Promise<number | null> {
        const [dataValue] = await this.session.read([
            { nodeId: resolveNodeId(nodeId), attributeId: AttributeIds.AccessLevel },
        ]);
        const accessLevel: unknown = dataValue.value.value;
        if (dataValue.statusCode.isNotGood() || typeof accessLevel !== 'number') {
            return null;
        }
        return accessLevel;
    }

    async readDataTypeName(nodeId: string): Promise<string> {
        const [dataTypeValue] = await this.session.read([
            { nodeId: resolveNodeId(nodeId), attributeId: AttributeIds.DataType },
        ]);
        const dataTypeId: unknown = dataTypeValue.value.value;
        if (dataTypeValue.statusCode.isNotGood() || !(dataTypeId instanceof NodeId)) {
            throw statusError('DataType attribute not readable', dataTypeValue);
        }

        const [displayNameValue] = await this.session.read([
            { nodeId: dataTypeId, attributeId: AttributeIds.DisplayName },
        ]);
        const displayName: unknown = displayNameValue.value.value;
        if (displayNameValue.statusCode.isNotGood() || !(displayName instanceof LocalizedText)) {
            throw statusError(`DisplayName of ${dataTypeId.toString()} not readable`, displayNameValue);
        }
        return displayName.text ?? dataTypeId.toString();
    }

    async readValue(nodeId: string): Promise<unknown> {
        const [dataValue] = await this.session.read([
            { nodeId: resolveNodeId(nodeId), attributeId: AttributeIds.Value },
        ]);
        if (dataValue.statusCode.isNotGood()) {
            throw new Error(dataValue.statusCode.toString());
        }
        const { dataType } = dataValue.value;
        const value: unknown = dataValue.value.value;
        if (dataType === DataType.Int64 || dataType === DataType.UInt64) {
            return widenInt64(value, dataType === DataType.Int64);
        }
        return value;
    }

    // Follows continuation points until the server has returned every reference.
    private async browseAll(description: BrowseDescriptionLike): Promise<NodeSummary[]> {
        const browseResult = await this.session.browse(description);
        if (browseResult.statusCode.isNotGood()) {
            throw new Error(`Browse failed: ${browseResult.statusCode.toString()}`);
        }
        const references: ReferenceDescription[] = [...(browseResult.references ?? [])];

        let continuationPoint: Buffer | null = browseResult.continuationPoint ?? null;
        while (continuationPoint && continuationPoint.length > 0) {
            const [nextResult] = await this.session.browseNext([continuationPoint], false);
            if (!nextResult) {
                break;
            }
            if (nextResult.statusCode.isNotGood()) {
                throw new Error(`BrowseNext failed: ${nextResult.statusCode.toString()}`);
            }
            references.push(...(nextResult.references ?? []));
            continuationPoint = nextResult.continuationPoint ?? null;
        }

        const seen = new Set<string>();
        const summaries: NodeSummary[] = [];
        for (const reference of references) {
            const summary = toSummary(reference);
            if (!seen.has(summary.nodeId)) {
                seen.add(summary.nodeId);
                summaries.push(summary);
            }
        }
        return summaries;
    }
}
