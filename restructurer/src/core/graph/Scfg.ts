/*
 * Copyright (c) 2024 Huawei Device Co., Ltd.
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *     http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

import { BasicBlock, BlockKind, JumpTarget } from './BasicBlock';
import {
    GraphError,
    InternalInvariantError,
    MalformedGraphError,
    RestructureErrorCode,
} from '../common/RestructureError';
import Logger, { LOG_MODULE_TYPE } from '../../utils/logger';
const logger = Logger.getLogger(LOG_MODULE_TYPE.RESTRUCTURER, 'Scfg');

export interface EdgeSpec {
    source: string;
    target: string;
    discriminant?: number;
}

/**
 * @category core/graph
 * An arena of blocks keyed by label with a single entry and an ordered set of exits. Edges are
 * stored on their source block as labels, so rewriting never invalidates a reference.
 */
export class Scfg {
    private blocks: Map<string, BasicBlock> = new Map();
    private entry: string;
    private exits: string[];

    constructor(entry: string, exits: string[] = []) {
        this.entry = entry;
        this.exits = [...exits];
    }

    /**
     * Builds and validates a graph.
     * @throws MalformedGraphError when the graph violates any SCFG invariant
     */
    public static create(labels: readonly string[], edges: readonly EdgeSpec[], entry: string, exits: readonly string[]): Scfg {
        let scfg = new Scfg(entry, [...exits]);
        for (const label of labels) {
            if (scfg.blocks.has(label)) {
                throw Scfg.reject({
                    errCode: RestructureErrorCode.GRAPH_DUPLICATE_LABEL,
                    errMsg: `duplicate block label '${label}'`,
                    labels: [label],
                });
            }
            scfg.blocks.set(label, new BasicBlock(label));
        }

        let edgesBySource = new Map<string, EdgeSpec[]>();
        for (const edge of edges) {
            if (!scfg.blocks.has(edge.source) || !scfg.blocks.has(edge.target)) {
                let unknown = scfg.blocks.has(edge.source) ? edge.target : edge.source;
                throw Scfg.reject({
                    errCode: RestructureErrorCode.GRAPH_UNKNOWN_LABEL,
                    errMsg: `edge ${edge.source} -> ${edge.target} references unknown label '${unknown}'`,
                    labels: [unknown],
                });
            }
            let list = edgesBySource.get(edge.source) ?? [];
            list.push(edge);
            edgesBySource.set(edge.source, list);
        }

        for (const [source, list] of edgesBySource) {
            let block = scfg.blocks.get(source);
            if (!block) {
                continue;
            }
            let discriminants = Scfg.normalizeDiscriminants(source, list);
            for (let i = 0; i < list.length; i++) {
                block.addJumpTarget(list[i].target, discriminants[i]);
            }
        }

        let error = scfg.validate();
        if (error.errCode !== RestructureErrorCode.OK) {
            throw Scfg.reject(error);
        }
        return scfg;
    }

    private static reject(error: GraphError): MalformedGraphError {
        logger.error(error.errMsg);
        return MalformedGraphError.fromGraphError(error);
    }

    /**
     * A block with several edges needs a discriminant on each of them; when none is given the edge
     * index is used.
     */
    private static normalizeDiscriminants(source: string, edges: EdgeSpec[]): (number | undefined)[] {
        let given = edges.filter((edge) => edge.discriminant !== undefined).length;
        if (edges.length > 1 && given === 0) {
            return edges.map((_, i) => i);
        }
        if (given !== 0 && given !== edges.length) {
            throw Scfg.reject({
                errCode: RestructureErrorCode.GRAPH_INVALID_DISCRIMINANT,
                errMsg: `block '${source}' mixes conditional and unconditional edges`,
                labels: [source],
            });
        }
        return edges.map((edge) => edge.discriminant);
    }

    public getEntry(): string {
        return this.entry;
    }

    public setEntry(entry: string): void {
        this.entry = entry;
    }

    public getExits(): readonly string[] {
        return this.exits;
    }

    public setExits(exits: string[]): void {
        this.exits = [...exits];
    }

    public isExit(label: string): boolean {
        return this.exits.includes(label);
    }

    public has(label: string): boolean {
        return this.blocks.has(label);
    }

    public getBlock(label: string): BasicBlock | undefined {
        return this.blocks.get(label);
    }

    public getBlocks(): IterableIterator<BasicBlock> {
        return this.blocks.values();
    }

    public getLabels(): string[] {
        return Array.from(this.blocks.keys());
    }

    public size(): number {
        return this.blocks.size;
    }

    public successors(label: string): readonly JumpTarget[] {
        let block = this.blocks.get(label);
        if (!block) {
            throw Scfg.reject({
                errCode: RestructureErrorCode.GRAPH_UNKNOWN_LABEL,
                errMsg: `unknown block label '${label}'`,
                labels: [label],
            });
        }
        return block.getJumpTargets();
    }

    /**
     * Blocks with at least one edge into `label`, in block insertion order.
     */
    public predecessors(label: string): string[] {
        let preds: string[] = [];
        for (const block of this.blocks.values()) {
            if (block.getJumpTargets().some((jt) => jt.target === label)) {
                preds.push(block.getLabel());
            }
        }
        return preds;
    }

    public addBlock(block: BasicBlock): void {
        if (this.blocks.has(block.getLabel())) {
            throw new InternalInvariantError(`block '${block.getLabel()}' already exists`, [block.getLabel()]);
        }
        this.blocks.set(block.getLabel(), block);
    }

    /**
     * Points the edges of `source` that lead to `from` at `to`.
     */
    public redirect(source: string, from: string, to: string): void {
        let block = this.blocks.get(source);
        if (!block || block.replaceTarget(from, to) === 0) {
            throw new InternalInvariantError(`no edge ${source} -> ${from} to redirect to ${to}`, [source, from, to]);
        }
    }

    public clone(): Scfg {
        let scfg = new Scfg(this.entry, this.exits);
        for (const block of this.blocks.values()) {
            scfg.blocks.set(block.getLabel(), block.clone());
        }
        return scfg;
    }

    public getUnreachableBlocks(): string[] {
        let reachable = this.collectReachable([this.entry], (label) => this.blocks.get(label)?.getTargets() ?? []);
        return this.getLabels().filter((label) => !reachable.has(label));
    }

    /**
     * Checks the SCFG invariants and reports the first violation found.
     */
    public validate(): GraphError {
        if (!this.blocks.has(this.entry)) {
            return {
                errCode: RestructureErrorCode.GRAPH_MISSING_ENTRY,
                errMsg: `entry block '${this.entry}' does not exist`,
                labels: [this.entry],
            };
        }
        if (this.exits.length === 0) {
            return { errCode: RestructureErrorCode.GRAPH_INVALID_EXIT, errMsg: 'graph declares no exit blocks' };
        }
        for (const exit of this.exits) {
            let block = this.blocks.get(exit);
            if (!block) {
                return {
                    errCode: RestructureErrorCode.GRAPH_INVALID_EXIT,
                    errMsg: `exit block '${exit}' does not exist`,
                    labels: [exit],
                };
            }
            if (block.getJumpTargets().length !== 0) {
                return {
                    errCode: RestructureErrorCode.GRAPH_INVALID_EXIT,
                    errMsg: `exit block '${exit}' has outgoing edges`,
                    labels: [exit],
                };
            }
        }

        for (const block of this.blocks.values()) {
            let error = this.validateBlock(block);
            if (error.errCode !== RestructureErrorCode.OK) {
                return error;
            }
        }

        let unreachable = this.getUnreachableBlocks();
        if (unreachable.length > 0) {
            return {
                errCode: RestructureErrorCode.GRAPH_HAS_UNREACHABLE_BLOCK,
                errMsg: `blocks unreachable from entry: ${unreachable.join(', ')}`,
                labels: unreachable,
            };
        }

        let terminating = this.collectReachable(this.exits, (label) => this.predecessors(label));
        let stuck = this.getLabels().filter((label) => !terminating.has(label));
        if (stuck.length > 0) {
            return {
                errCode: RestructureErrorCode.GRAPH_HAS_NON_TERMINATING_BLOCK,
                errMsg: `blocks that cannot reach an exit: ${stuck.join(', ')}`,
                labels: stuck,
            };
        }
        return { errCode: RestructureErrorCode.OK };
    }

    private validateBlock(block: BasicBlock): GraphError {
        let label = block.getLabel();
        let jumpTargets = block.getJumpTargets();
        if (jumpTargets.length === 0 && !this.isExit(label)) {
            return {
                errCode: RestructureErrorCode.GRAPH_DANGLING_BLOCK,
                errMsg: `block '${label}' has no outgoing edges and is not an exit`,
                labels: [label],
            };
        }
        let seen = new Set<number>();
        for (const jt of jumpTargets) {
            if (!this.blocks.has(jt.target)) {
                return {
                    errCode: RestructureErrorCode.GRAPH_UNKNOWN_LABEL,
                    errMsg: `edge ${label} -> ${jt.target} references unknown label '${jt.target}'`,
                    labels: [jt.target],
                };
            }
            if (jt.discriminant === undefined) {
                continue;
            }
            if (!Number.isInteger(jt.discriminant) || seen.has(jt.discriminant)) {
                return {
                    errCode: RestructureErrorCode.GRAPH_INVALID_DISCRIMINANT,
                    errMsg: `block '${label}' has an invalid or duplicated discriminant ${jt.discriminant}`,
                    labels: [label],
                };
            }
            seen.add(jt.discriminant);
        }
        return { errCode: RestructureErrorCode.OK };
    }

    private collectReachable(starts: readonly string[], next: (label: string) => string[]): Set<string> {
        let visited = new Set<string>();
        let stack = [...starts];
        while (stack.length > 0) {
            let label = stack.pop();
            if (label === undefined || visited.has(label)) {
                continue;
            }
            visited.add(label);
            stack.push(...next(label));
        }
        return visited;
    }

    public countSynthetic(): number {
        let count = 0;
        for (const block of this.blocks.values()) {
            if (block.getKind() !== BlockKind.BASIC) {
                count++;
            }
        }
        return count;
    }
}
