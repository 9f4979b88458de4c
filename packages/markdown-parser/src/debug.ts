// packages/markdown-parser/src/debug.ts
import type { BlockNode } from "./ast";

export interface DebugSnapshot {
    stage: string;
    nodes: BlockNode[];
    logs: string[];
}

/**
 * Collects log lines and stage snapshots for one caller.
 * Nothing here is module-level, so two traces never see each other's output.
 */
export interface DebugTrace {
    readonly logs: readonly string[];
    readonly snapshots: readonly DebugSnapshot[];
    log(message: string): void;
    snapshot(stage: string, nodes: readonly BlockNode[]): void;
}

export function createDebugTrace(): DebugTrace {
    let pendingLogs: string[] = [];
    const allLogs: string[] = [];
    const snapshots: DebugSnapshot[] = [];

    return {
        logs: allLogs,
        snapshots,
        log(message: string) {
            pendingLogs.push(message);
            allLogs.push(message);
        },
        snapshot(stage: string, nodes: readonly BlockNode[]) {
            snapshots.push({
                stage,
                nodes: cloneNodes(nodes),
                logs: pendingLogs,
            });
            pendingLogs = [];
        },
    };
}

function cloneNodes(nodes: readonly BlockNode[]): BlockNode[] {
    return nodes.map(node => {
        switch (node.type) {
            case "unordered_list":
            case "ordered_list":
                return { ...node, items: [...node.items] };
            default:
                return { ...node };
        }
    });
}

export function logDebug(trace: DebugTrace | undefined, message: string) {
    if (!trace) return;
    trace.log(message);
}

export function captureSnapshot(trace: DebugTrace | undefined, stage: string, nodes: readonly BlockNode[]) {
    if (!trace) return;
    trace.snapshot(stage, nodes);
}
