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

import { RestructureConfig } from '../Config';
import { ControlVariable, ControlVariableAllocator, VariableScope } from '../core/common/ControlVariableAllocator';
import { NameGenerator } from '../core/common/NameGenerator';
import { InternalInvariantError } from '../core/common/RestructureError';
import { BasicBlock, BlockKind } from '../core/graph/BasicBlock';
import { Scfg } from '../core/graph/Scfg';
import { RegionKind } from '../core/region/Region';

/**
 * A loop that has been folded into a single node of its enclosing task. The node keeps the label
 * of the loop head; control leaves the loop through the edges of `exiting` that do not lead back
 * into it.
 */
export interface CollapsedLoop {
    header: string;
    latch: string;
    /** The latch, or the header when the header tests the exit condition itself. */
    exiting: string;
    /** Where a guarding header enters the body. Unset when the header starts the body. */
    bodyEntry?: string;
    regionId: string;
    bodyTaskId: number;
    exits: string[];
    backedgeVariable?: string;
    exitVariable?: string;
}

/**
 * One sub-problem of the restructuring worklist: a node set with a single entry whose edges leave
 * the set towards at most one outside label. Edges aimed at `entry` or at the header of the
 * enclosing loop are ignored, which is how a loop body and its parts lose their back edges.
 */
export class RestructureTask {
    private id: number;
    private parentId?: number;
    private entry: string;
    private nodes: Set<string>;
    private loops: Map<string, CollapsedLoop>;
    private backedgeTarget?: string;

    constructor(
        id: number,
        entry: string,
        nodes: Iterable<string>,
        loops: Map<string, CollapsedLoop>,
        parentId?: number,
        backedgeTarget?: string
    ) {
        this.id = id;
        this.entry = entry;
        this.nodes = new Set(nodes);
        this.loops = loops;
        this.parentId = parentId;
        this.backedgeTarget = backedgeTarget;
    }

    public getId(): number {
        return this.id;
    }

    public getParentId(): number | undefined {
        return this.parentId;
    }

    public getEntry(): string {
        return this.entry;
    }

    /**
     * Header of the innermost loop whose body contains this task.
     */
    public getBackedgeTarget(): string | undefined {
        return this.backedgeTarget;
    }

    public getNodes(): Set<string> {
        return this.nodes;
    }

    public getLoops(): Map<string, CollapsedLoop> {
        return this.loops;
    }

    /**
     * The loops among `nodes`, for handing down to a child task.
     */
    public inheritLoops(nodes: Iterable<string>): Map<string, CollapsedLoop> {
        let inherited = new Map<string, CollapsedLoop>();
        for (const node of nodes) {
            let loop = this.loops.get(node);
            if (loop) {
                inherited.set(node, loop);
            }
        }
        return inherited;
    }

    /**
     * The block holding the outgoing edges of a task node.
     */
    public getSourceBlock(node: string): string {
        return this.loops.get(node)?.exiting ?? node;
    }
}

/**
 * State shared by the passes of one restructuring run: the working graph, the synthetic name and
 * variable allocators, region ids and the task worklist.
 */
export class RestructureContext {
    private graph: Scfg;
    private names: NameGenerator;
    private allocator: ControlVariableAllocator;
    private tasks: RestructureTask[] = [];
    private pending: RestructureTask[] = [];
    private regionCounter = 0;

    constructor(graph: Scfg, config: RestructureConfig) {
        this.graph = graph;
        this.names = new NameGenerator(config.getSyntheticLabelPrefix(), (label) => graph.has(label));
        this.allocator = new ControlVariableAllocator(config.getControlVariablePrefix());
    }

    public getGraph(): Scfg {
        return this.graph;
    }

    public getAllocator(): ControlVariableAllocator {
        return this.allocator;
    }

    public newRegionId(kind: RegionKind): string {
        return `${kind}_${this.regionCounter++}`;
    }

    public getRegionCount(): number {
        return this.regionCounter;
    }

    public createBlock(kind: BlockKind): BasicBlock {
        let block = new BasicBlock(this.names.newLabel(kind), kind);
        this.graph.addBlock(block);
        return block;
    }

    /**
     * Creates an assignment block writing `assignments` that jumps to `target`, and records the
     * writes on the variables.
     */
    public createAssignment(assignments: [ControlVariable, number][], target: string): BasicBlock {
        let block = this.createBlock(BlockKind.SYNTHETIC_ASSIGNMENT);
        for (const [variable, value] of assignments) {
            block.setAssignment(variable.getName(), value);
            variable.addAssignment(block.getLabel(), value);
        }
        block.addJumpTarget(target);
        return block;
    }

    public createDispatch(kind: BlockKind, variable: ControlVariable, targets: string[]): BasicBlock {
        let block = this.createBlock(kind);
        block.setVariable(variable.getName());
        variable.addDispatchSite(block.getLabel());
        targets.forEach((target, i) => block.addJumpTarget(target, i));
        return block;
    }

    public getScope(task: RestructureTask): VariableScope {
        let scope = this.allocator.getScope(task.getId());
        if (!scope) {
            throw new InternalInvariantError(`task ${task.getId()} has no variable scope`, task.getNodes());
        }
        return scope;
    }

    /**
     * Queues a task. Unless `backedgeTarget` is given the task lies in the same loop body as its
     * parent.
     */
    public addTask(
        entry: string,
        nodes: Iterable<string>,
        loops: Map<string, CollapsedLoop>,
        parent?: RestructureTask,
        backedgeTarget: string | undefined = parent?.getBackedgeTarget()
    ): RestructureTask {
        let task = new RestructureTask(this.tasks.length, entry, nodes, loops, parent?.getId(), backedgeTarget);
        this.tasks.push(task);
        this.pending.push(task);
        return task;
    }

    /**
     * Dequeues the next task in creation order and opens its variable scope. Scopes open only
     * once the parent task has finished allocating.
     */
    public nextTask(): RestructureTask | undefined {
        let task = this.pending.shift();
        if (task) {
            this.allocator.openScope(task.getId(), task.getParentId());
        }
        return task;
    }

    public getPendingBlocks(): string[] {
        let blocks: string[] = [];
        for (const task of this.pending) {
            blocks.push(...task.getNodes());
        }
        return blocks;
    }
}
