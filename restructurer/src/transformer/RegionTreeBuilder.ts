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

import { RestructureConfig, RestructureOptions } from '../Config';
import { ControlVariable } from '../core/common/ControlVariableAllocator';
import { InternalInvariantError, MalformedGraphError, NonConvergenceError, RestructureErrorCode } from '../core/common/RestructureError';
import { BlockKind } from '../core/graph/BasicBlock';
import { Scfg } from '../core/graph/Scfg';
import { BlockNode, LinearRegion, LoopRegion, Region, RegionKind, RegionNode } from '../core/region/Region';
import { BranchRestructurer, TaskPlan } from './BranchRestructurer';
import { LoopRestructurer } from './LoopRestructurer';
import { CollapsedLoop, RestructureContext } from './RestructureContext';
import Logger, { LOG_MODULE_TYPE } from '../utils/logger';

const logger = Logger.getLogger(LOG_MODULE_TYPE.RESTRUCTURER, 'RegionTreeBuilder');

export interface RestructureResult {
    /** Root of the region tree. Every block of `graph` is a leaf exactly once. */
    region: Region;
    /** The input graph with the synthetic blocks added and edges redirected through them. */
    graph: Scfg;
    /** Control variables keyed by the id of the smallest region that writes and reads them. */
    variables: Map<string, readonly ControlVariable[]>;
}

/**
 * Drives the loop and branch passes over a worklist of tasks until every block is placed, then
 * assembles the region tree from the task plans.
 */
export class RegionTreeBuilder {
    private scfg: Scfg;
    private config: RestructureConfig;

    constructor(scfg: Scfg, config: RestructureConfig = new RestructureConfig()) {
        this.scfg = scfg;
        this.config = config;
    }

    public build(): RestructureResult {
        let error = this.scfg.validate();
        if (error.errCode !== RestructureErrorCode.OK) {
            logger.error(error.errMsg);
            throw MalformedGraphError.fromGraphError(error);
        }

        let graph = this.scfg.clone();
        let context = new RestructureContext(graph, this.config);
        this.closeGraph(context);

        let loopPass = new LoopRestructurer(context);
        let branchPass = new BranchRestructurer(context);
        let plans: TaskPlan[] = [];
        let roundLimit = this.config.getRoundLimit(this.scfg.size());
        let rounds = 0;

        context.addTask(graph.getEntry(), graph.getLabels(), new Map());
        for (let task = context.nextTask(); task !== undefined; task = context.nextTask()) {
            rounds++;
            if (rounds > roundLimit) {
                let pending = [...task.getNodes(), ...context.getPendingBlocks()];
                logger.error(`no convergence after ${roundLimit} rounds, pending blocks: ${pending.join(', ')}`);
                throw new NonConvergenceError(roundLimit, pending);
            }
            loopPass.restructure(task);
            let plan = branchPass.restructure(task);
            plans[task.getId()] = plan;
            context.getAllocator().bindRegion(task.getId(), plan.regionId);
        }

        let region = this.assemble(context, plans);
        let variables = context.getAllocator().getTable();
        logger.info(
            `restructured ${this.scfg.size()} blocks in ${rounds} rounds: ${context.getRegionCount()} regions, ` +
                `${graph.countSynthetic()} synthetic blocks, ${context.getAllocator().getVariableCount()} control variables`
        );
        return { region, graph, variables };
    }

    /**
     * Gives the working graph a single exit and an entry without predecessors.
     */
    private closeGraph(context: RestructureContext): void {
        let graph = context.getGraph();
        let exits = graph.getExits();
        if (exits.length > 1) {
            let ret = context.createBlock(BlockKind.SYNTHETIC_RETURN);
            for (const exit of exits) {
                graph.getBlock(exit)?.addJumpTarget(ret.getLabel());
            }
            graph.setExits([ret.getLabel()]);
            logger.debug(`joined exits [${exits.join(', ')}] into ${ret.getLabel()}`);
        }
        if (graph.predecessors(graph.getEntry()).length > 0) {
            let entry = context.createBlock(BlockKind.SYNTHETIC_ENTRY);
            entry.addJumpTarget(graph.getEntry());
            graph.setEntry(entry.getLabel());
            logger.debug(`entry has predecessors, added ${entry.getLabel()}`);
        }
    }

    /**
     * Builds the region of every plan after the regions it contains, walking the plans with an
     * explicit stack. A loop can be handed down to a task planned after its body, so task order
     * alone is not enough.
     */
    private assemble(context: RestructureContext, plans: TaskPlan[]): Region {
        let regions = new Map<number, Region>();
        let stack: number[] = [0];
        while (stack.length > 0) {
            let taskId = stack[stack.length - 1];
            let plan = plans[taskId];
            if (!plan) {
                throw new InternalInvariantError(`task ${taskId} was never planned`, []);
            }
            if (regions.has(taskId)) {
                stack.pop();
                continue;
            }
            let missing = this.getDependencies(plan).filter((id) => !regions.has(id));
            if (missing.length > 0) {
                stack.push(...missing.reverse());
                continue;
            }
            regions.set(taskId, this.buildRegion(context, plan, regions));
            stack.pop();
        }
        return this.getBuilt(regions, 0);
    }

    private getDependencies(plan: TaskPlan): number[] {
        let dependencies: number[] = [];
        for (const label of plan.chain) {
            let loop = plan.loops.get(label);
            if (loop) {
                dependencies.push(loop.bodyTaskId);
            }
        }
        if (plan.branch) {
            dependencies.push(...plan.branch.arms.map((arm) => arm.taskId));
            if (plan.branch.tailTaskId !== undefined) {
                dependencies.push(plan.branch.tailTaskId);
            }
        }
        return dependencies;
    }

    private getBuilt(regions: Map<number, Region>, taskId: number): Region {
        let region = regions.get(taskId);
        if (!region) {
            throw new InternalInvariantError(`region of task ${taskId} was not built`, []);
        }
        return region;
    }

    private buildRegion(context: RestructureContext, plan: TaskPlan, regions: Map<number, Region>): Region {
        let graph = context.getGraph();
        let items: RegionNode[] = plan.chain.map((label) => {
            let loop = plan.loops.get(label);
            if (loop) {
                return this.buildLoop(graph, loop, this.getBuilt(regions, loop.bodyTaskId));
            }
            return this.buildBlock(graph, label);
        });

        if (plan.branch) {
            let head: LinearRegion = { kind: RegionKind.LINEAR, id: plan.branch.headId, children: items };
            let arms = plan.branch.arms.map((arm) => ({ discriminants: arm.discriminants, region: this.getBuilt(regions, arm.taskId) }));
            if (plan.branch.tailTaskId === undefined) {
                return { kind: RegionKind.BRANCH, id: plan.regionId, head, arms };
            }
            return { kind: RegionKind.BRANCH, id: plan.regionId, head, arms, tail: this.getBuilt(regions, plan.branch.tailTaskId) };
        }
        let first = items[0];
        if (items.length === 1 && first.kind === RegionKind.LOOP) {
            return first;
        }
        return { kind: RegionKind.LINEAR, id: plan.regionId, children: items };
    }

    private buildBlock(graph: Scfg, label: string): BlockNode {
        return { kind: 'block', label, synthetic: graph.getBlock(label)?.isSynthetic() ?? false };
    }

    private buildLoop(graph: Scfg, loop: CollapsedLoop, body: Region): LoopRegion {
        let region: LoopRegion = {
            kind: RegionKind.LOOP,
            id: loop.regionId,
            header: loop.header,
            latch: loop.latch,
            body,
            exits: [...loop.exits],
        };
        if (loop.bodyEntry !== undefined) {
            region = { ...region, guard: this.buildBlock(graph, loop.header) };
        }
        if (loop.backedgeVariable !== undefined) {
            region = { ...region, backedgeVariable: loop.backedgeVariable };
        }
        if (loop.exitVariable !== undefined) {
            region = { ...region, exitVariable: loop.exitVariable };
        }
        return region;
    }
}

/**
 * Restructures `scfg` into a region tree.
 * @throws MalformedGraphError when the input is not a valid SCFG
 * @throws InternalInvariantError when restructuring fails, NonConvergenceError when it runs out of rounds
 */
export function restructure(scfg: Scfg, options?: RestructureOptions | RestructureConfig): RestructureResult {
    let config = options instanceof RestructureConfig ? options : new RestructureConfig(options);
    return new RegionTreeBuilder(scfg, config).build();
}
