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

import { ControlVariable, ControlVariableKind } from '../core/common/ControlVariableAllocator';
import { InternalInvariantError } from '../core/common/RestructureError';
import { BlockKind } from '../core/graph/BasicBlock';
import { StronglyConnectedComponents } from '../core/graph/StronglyConnectedComponents';
import { RegionKind } from '../core/region/Region';
import { CollapsedLoop, RestructureContext, RestructureTask } from './RestructureContext';
import { TaskGraph } from './TaskGraph';
import Logger, { LOG_MODULE_TYPE } from '../utils/logger';

const logger = Logger.getLogger(LOG_MODULE_TYPE.RESTRUCTURER, 'LoopRestructurer');

interface Edge {
    source: string;
    target: string;
}

interface LoopRewrite {
    members: Set<string>;
    loop: CollapsedLoop;
}

/**
 * Folds every cycle of a task into a loop with one head and one latch. The rewritten loop becomes a
 * child task and a single node of the task it was found in.
 */
export class LoopRestructurer {
    private context: RestructureContext;
    private order: Map<string, number> = new Map();

    constructor(context: RestructureContext) {
        this.context = context;
    }

    public restructure(task: RestructureTask): void {
        let view = new TaskGraph(this.context.getGraph(), task);
        let preorder = view.getPreorder();
        this.order = new Map(preorder.map((label, i) => [label, i]));
        let components = new StronglyConnectedComponents(preorder, (node) => view.getInternalSuccessors(node)).getCyclicComponents();
        if (components.length === 0) {
            return;
        }

        // every loop is rewritten before any is collapsed, so the edge scans below see plain blocks
        let rewrites: LoopRewrite[] = [];
        for (const component of components) {
            for (const node of component) {
                if (task.getLoops().has(node)) {
                    throw new InternalInvariantError('cycle runs through an already collapsed loop', component);
                }
            }
            rewrites.push(this.rewriteLoop(task, this.sortByOrder(component)));
        }
        for (const rewrite of rewrites) {
            this.collapse(task, rewrite);
        }
    }

    private sortByOrder(labels: Iterable<string>): string[] {
        return Array.from(labels).sort((a, b) => this.getOrder(a) - this.getOrder(b));
    }

    private getOrder(label: string): number {
        let order = this.order.get(label);
        if (order === undefined) {
            order = this.order.size;
            this.order.set(label, order);
        }
        return order;
    }

    /**
     * New blocks stay in the task until the loop they belong to is collapsed.
     */
    private addBlock(task: RestructureTask, label: string, members?: Set<string>): void {
        task.getNodes().add(label);
        members?.add(label);
        this.getOrder(label);
    }

    private edgesOf(label: string): string[] {
        return this.context.getGraph().getBlock(label)?.getTargets() ?? [];
    }

    private rewriteLoop(task: RestructureTask, loopNodes: string[]): LoopRewrite {
        let members = new Set(loopNodes);

        let entries: Edge[] = [];
        let headers: string[] = [];
        for (const source of this.sortByOrder(task.getNodes())) {
            if (members.has(source)) {
                continue;
            }
            for (const target of this.edgesOf(source)) {
                if (members.has(target)) {
                    entries.push({ source, target });
                    if (!headers.includes(target)) {
                        headers.push(target);
                    }
                }
            }
        }

        let exits: Edge[] = [];
        let exitTargets: string[] = [];
        let backEdges: Edge[] = [];
        for (const source of loopNodes) {
            for (const target of this.edgesOf(source)) {
                if (target === task.getEntry()) {
                    throw new InternalInvariantError(`loop block '${source}' jumps back to the region entry`, loopNodes);
                }
                if (!members.has(target)) {
                    exits.push({ source, target });
                    if (!exitTargets.includes(target)) {
                        exitTargets.push(target);
                    }
                } else if (headers.includes(target)) {
                    backEdges.push({ source, target });
                }
            }
        }
        if (headers.length === 0 || exitTargets.length === 0) {
            throw new InternalInvariantError('loop has no entry or no exit', loopNodes);
        }
        logger.debug(`loop [${loopNodes.join(', ')}] headers [${headers.join(', ')}] exits [${exitTargets.join(', ')}]`);

        let natural = this.getNaturalLatch(headers, exits, backEdges, exitTargets);
        if (natural !== undefined) {
            return {
                members,
                loop: {
                    header: headers[0],
                    latch: natural,
                    exiting: natural,
                    regionId: this.context.newRegionId(RegionKind.LOOP),
                    bodyTaskId: -1,
                    exits: exitTargets,
                },
            };
        }
        let guarded = this.getGuardedBody(members, headers, exits, backEdges, exitTargets);
        if (guarded !== undefined) {
            logger.debug(`loop header ${headers[0]} guards a body entered at ${guarded.entry}`);
            return {
                members,
                loop: {
                    header: headers[0],
                    latch: guarded.latch,
                    exiting: headers[0],
                    bodyEntry: guarded.entry,
                    regionId: this.context.newRegionId(RegionKind.LOOP),
                    bodyTaskId: -1,
                    exits: exitTargets,
                },
            };
        }
        return this.rewriteWithLatch(task, loopNodes, members, entries, headers, exitTargets);
    }

    /**
     * A loop needs no synthetic blocks when one block is both its only exiting block and the only
     * source of back edges, and that block goes nowhere but the header and a single exit.
     */
    private getNaturalLatch(headers: string[], exits: Edge[], backEdges: Edge[], exitTargets: string[]): string | undefined {
        if (headers.length !== 1 || exitTargets.length !== 1) {
            return undefined;
        }
        let latch = exits[0].source;
        if (exits.some((edge) => edge.source !== latch) || backEdges.some((edge) => edge.source !== latch)) {
            return undefined;
        }
        if (!this.edgesOf(latch).every((target) => target === headers[0] || target === exitTargets[0])) {
            return undefined;
        }
        return latch;
    }

    /**
     * The other loop that needs no synthetic blocks: only the header leaves it, towards a single
     * exit, and one block other than the header jumps back and nowhere else. The header then tests
     * the exit condition before a body entered at its only successor inside the loop, which no
     * other block of the loop may jump to.
     */
    private getGuardedBody(
        members: Set<string>,
        headers: string[],
        exits: Edge[],
        backEdges: Edge[],
        exitTargets: string[]
    ): { latch: string; entry: string } | undefined {
        if (headers.length !== 1 || exitTargets.length !== 1 || backEdges.length === 0) {
            return undefined;
        }
        let header = headers[0];
        let latch = backEdges[0].source;
        if (latch === header || exits.some((edge) => edge.source !== header) || backEdges.some((edge) => edge.source !== latch)) {
            return undefined;
        }
        if (!this.edgesOf(latch).every((target) => target === header)) {
            return undefined;
        }
        let inside = new Set(this.edgesOf(header).filter((target) => members.has(target)));
        if (inside.size !== 1) {
            return undefined;
        }
        let [entry] = inside;
        for (const member of members) {
            if (member !== header && this.edgesOf(member).includes(entry)) {
                return undefined;
            }
        }
        return { latch, entry };
    }

    private rewriteWithLatch(
        task: RestructureTask,
        loopNodes: string[],
        members: Set<string>,
        entries: Edge[],
        headers: string[],
        exitTargets: string[]
    ): LoopRewrite {
        let graph = this.context.getGraph();
        let scope = this.context.getScope(task);

        let loopHead = headers[0];
        let headVariable: ControlVariable | undefined;
        if (headers.length > 1) {
            headVariable = scope.allocate(ControlVariableKind.HEAD);
            let head = this.context.createDispatch(BlockKind.SYNTHETIC_HEAD, headVariable, headers);
            loopHead = head.getLabel();
            this.addBlock(task, loopHead, members);
            for (const entry of entries) {
                let assignment = this.context.createAssignment([[headVariable, headers.indexOf(entry.target)]], loopHead);
                graph.redirect(entry.source, entry.target, assignment.getLabel());
                this.addBlock(task, assignment.getLabel());
            }
            logger.debug(`unified headers [${headers.join(', ')}] behind ${loopHead}`);
        }

        let exitVariable: ControlVariable | undefined;
        if (exitTargets.length > 1) {
            exitVariable = headVariable ?? scope.allocate(ControlVariableKind.EXIT);
        }
        let backedgeVariable = scope.allocate(ControlVariableKind.BACKEDGE);

        let exitSide = exitTargets[0];
        if (exitVariable) {
            let exitDispatch = this.context.createDispatch(BlockKind.SYNTHETIC_EXIT, exitVariable, exitTargets);
            exitSide = exitDispatch.getLabel();
            this.addBlock(task, exitSide);
        }
        let latch = this.context.createDispatch(BlockKind.SYNTHETIC_EXITING_LATCH, backedgeVariable, [loopHead, exitSide]);
        this.addBlock(task, latch.getLabel(), members);

        for (const source of loopNodes) {
            for (const target of this.edgesOf(source)) {
                let assignments: [ControlVariable, number][];
                if (!members.has(target)) {
                    assignments = [[backedgeVariable, 1]];
                    if (exitVariable) {
                        assignments.push([exitVariable, exitTargets.indexOf(target)]);
                    }
                } else if (headers.includes(target)) {
                    assignments = [[backedgeVariable, 0]];
                    if (headVariable) {
                        assignments.push([headVariable, headers.indexOf(target)]);
                    }
                } else {
                    continue;
                }
                let assignment = this.context.createAssignment(assignments, latch.getLabel());
                graph.redirect(source, target, assignment.getLabel());
                this.addBlock(task, assignment.getLabel(), members);
            }
        }

        // the backedge variable is written and read inside the loop only
        let regionId = this.context.newRegionId(RegionKind.LOOP);
        this.context.getAllocator().assignRegion(backedgeVariable, regionId);
        return {
            members,
            loop: {
                header: loopHead,
                latch: latch.getLabel(),
                exiting: latch.getLabel(),
                regionId,
                bodyTaskId: -1,
                exits: exitTargets,
                backedgeVariable: backedgeVariable.getName(),
                exitVariable: exitVariable?.getName(),
            },
        };
    }

    private collapse(task: RestructureTask, rewrite: LoopRewrite): void {
        let graph = this.context.getGraph();
        let { members, loop } = rewrite;

        for (const member of members) {
            if (member === loop.latch) {
                continue;
            }
            if ((graph.getBlock(member)?.getTargets() ?? []).includes(loop.header)) {
                throw new InternalInvariantError(`loop body still cycles through its header '${loop.header}'`, members);
            }
        }
        for (const node of task.getNodes()) {
            if (members.has(node)) {
                continue;
            }
            for (const target of graph.getBlock(task.getSourceBlock(node))?.getTargets() ?? []) {
                if (members.has(target) && target !== loop.header) {
                    throw new InternalInvariantError(`'${node}' enters loop ${loop.regionId} away from its header`, members);
                }
            }
        }

        for (const member of members) {
            task.getNodes().delete(member);
        }
        task.getNodes().add(loop.header);
        let bodyNodes = new Set(members);
        if (loop.bodyEntry !== undefined) {
            bodyNodes.delete(loop.header);
        }
        let body = this.context.addTask(loop.bodyEntry ?? loop.header, bodyNodes, new Map(), task, loop.header);
        loop.bodyTaskId = body.getId();
        task.getLoops().set(loop.header, loop);
        logger.debug(`collapsed loop ${loop.regionId} with header ${loop.header} and latch ${loop.latch}`);
    }
}
