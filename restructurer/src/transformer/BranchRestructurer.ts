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

import { ControlVariableKind } from '../core/common/ControlVariableAllocator';
import { InternalInvariantError } from '../core/common/RestructureError';
import { BlockKind } from '../core/graph/BasicBlock';
import { ReversedGraph } from '../core/graph/DirectedGraph';
import { DominanceFinder } from '../core/graph/DominanceFinder';
import { DominanceTree } from '../core/graph/DominanceTree';
import { RegionKind } from '../core/region/Region';
import { CollapsedLoop, RestructureContext, RestructureTask } from './RestructureContext';
import { TASK_EXIT, TaskGraph, TaskNode } from './TaskGraph';
import Logger, { LOG_MODULE_TYPE } from '../utils/logger';

const logger = Logger.getLogger(LOG_MODULE_TYPE.RESTRUCTURER, 'BranchRestructurer');

export interface ArmPlan {
    discriminants: number[];
    taskId: number;
}

export interface BranchPlan {
    headId: string;
    arms: ArmPlan[];
    tailTaskId?: number;
}

/**
 * How one task turns into a region: the chain of nodes executed first, and when the chain ends in
 * a conditional jump, the child tasks of the arms and the tail.
 */
export interface TaskPlan {
    taskId: number;
    regionId: string;
    chain: string[];
    /** Collapsed loops among the chain nodes, by header label. */
    loops: ReadonlyMap<string, CollapsedLoop>;
    branch?: BranchPlan;
}

interface Arm {
    start: string;
    nodes: string[];
}

/**
 * Splits an acyclic task at its first conditional jump into head, arms and tail.
 */
export class BranchRestructurer {
    private context: RestructureContext;

    constructor(context: RestructureContext) {
        this.context = context;
    }

    public restructure(task: RestructureTask): TaskPlan {
        let view = new TaskGraph(this.context.getGraph(), task);
        this.checkSingleExit(task, view);

        let chain: string[] = [task.getEntry()];
        let head: string | undefined;
        for (;;) {
            let current = chain[chain.length - 1];
            let succs = view.getSuccessors(current);
            if (succs.length > 1) {
                head = current;
                break;
            }
            let next = succs[0];
            if (next === undefined || next === TASK_EXIT) {
                break;
            }
            if (chain.includes(next)) {
                throw new InternalInvariantError(`cycle through '${next}' left in an acyclic region`, task.getNodes());
            }
            chain.push(next);
        }

        if (head === undefined) {
            if (chain.length !== task.getNodes().size) {
                throw new InternalInvariantError('linear chain does not cover its region', task.getNodes());
            }
            let loop = chain.length === 1 ? task.getLoops().get(chain[0]) : undefined;
            return {
                taskId: task.getId(),
                regionId: loop ? loop.regionId : this.context.newRegionId(RegionKind.LINEAR),
                chain,
                loops: task.inheritLoops(chain),
            };
        }
        return this.restructureBranch(task, view, chain, head);
    }

    private checkSingleExit(task: RestructureTask, view: TaskGraph): void {
        if (view.getOutsideTargets().length > 1) {
            throw new InternalInvariantError(
                `region leaves towards several blocks: ${view.getOutsideTargets().join(', ')}`,
                task.getNodes()
            );
        }
    }

    private restructureBranch(task: RestructureTask, view: TaskGraph, chain: string[], head: string): TaskPlan {
        let graph = this.context.getGraph();
        let postDominance = new DominanceFinder<TaskNode>(new ReversedGraph(view, TASK_EXIT));
        let merge = postDominance.getImmediateDominator(head);
        if (merge === undefined) {
            throw new InternalInvariantError(`no merge point for branch at '${head}'`, task.getNodes());
        }
        let dominanceTree = new DominanceTree<TaskNode>(new DominanceFinder<TaskNode>(view));
        let succs = view.getSuccessors(head);
        let outside = view.getOutsideTargets()[0];

        let arms: Arm[] = [];
        for (const succ of succs) {
            let empty =
                succ === TASK_EXIT ||
                succ === merge ||
                succs.some((other) => other !== succ && other !== TASK_EXIT && view.reaches(other, succ));
            if (!empty && succ !== TASK_EXIT) {
                let nodes: string[] = [];
                for (const node of dominanceTree.getAllNodesDFS(succ)) {
                    if (node !== TASK_EXIT) {
                        nodes.push(node);
                    }
                }
                arms.push({ start: succ, nodes });
                continue;
            }
            let target = succ === TASK_EXIT ? outside : succ;
            if (target === undefined) {
                throw new InternalInvariantError(`branch at '${head}' leaves a region without an exit`, task.getNodes());
            }
            let fill = this.context.createBlock(BlockKind.SYNTHETIC_FILL);
            fill.addJumpTarget(target);
            graph.redirect(task.getSourceBlock(head), target, fill.getLabel());
            task.getNodes().add(fill.getLabel());
            arms.push({ start: fill.getLabel(), nodes: [fill.getLabel()] });
        }

        // fills changed the edges of the head
        view = new TaskGraph(graph, task);
        let placed = new Set<string>(chain);
        for (const arm of arms) {
            for (const node of arm.nodes) {
                if (placed.has(node)) {
                    throw new InternalInvariantError(`'${node}' belongs to two parts of branch at '${head}'`, task.getNodes());
                }
                placed.add(node);
            }
        }
        let tail: string[] = [];
        for (const node of task.getNodes()) {
            if (!placed.has(node)) {
                tail.push(node);
            }
        }
        let tailEntry = this.unifyTail(task, view, arms, tail, outside);
        if (tailEntry !== undefined && tail[0] !== tailEntry) {
            tail.splice(tail.indexOf(tailEntry), 1);
            tail.unshift(tailEntry);
        }

        let discriminants = new Map<string, number[]>();
        let jumpTargets = graph.getBlock(task.getSourceBlock(head))?.getJumpTargets() ?? [];
        jumpTargets.forEach((jt, i) => {
            let list = discriminants.get(jt.target) ?? [];
            list.push(jt.discriminant ?? i);
            discriminants.set(jt.target, list);
        });
        let ordered = arms
            .map((arm) => ({ arm, values: (discriminants.get(arm.start) ?? []).sort((a, b) => a - b) }))
            .sort((a, b) => (a.values[0] ?? 0) - (b.values[0] ?? 0));

        let regionId = this.context.newRegionId(RegionKind.BRANCH);
        let headId = this.context.newRegionId(RegionKind.LINEAR);
        let armPlans: ArmPlan[] = [];
        for (const { arm, values } of ordered) {
            let child = this.context.addTask(arm.start, arm.nodes, task.inheritLoops(arm.nodes), task);
            armPlans.push({ discriminants: values, taskId: child.getId() });
        }
        let branch: BranchPlan = { headId, arms: armPlans };
        if (tailEntry !== undefined) {
            let child = this.context.addTask(tailEntry, tail, task.inheritLoops(tail), task);
            branch.tailTaskId = child.getId();
        }
        logger.debug(
            `branch at ${head}: arms [${ordered.map(({ arm }) => arm.start).join(', ')}] merge ${
                merge === TASK_EXIT ? '<exit>' : merge
            } tail ${tailEntry ?? '<none>'}`
        );
        return { taskId: task.getId(), regionId, chain, loops: task.inheritLoops(chain), branch };
    }

    /**
     * Collects where the arms continue. Several continuations are funnelled through a tail
     * dispatch; the returned label is the entry of the tail, if the branch has one.
     */
    private unifyTail(task: RestructureTask, view: TaskGraph, arms: Arm[], tail: string[], outside?: string): string | undefined {
        let tailNodes = new Set(tail);
        let continuations: { arm: Arm; source: string; target: TaskNode }[] = [];
        let targets: TaskNode[] = [];
        for (const arm of arms) {
            let armNodes = new Set(arm.nodes);
            for (const source of arm.nodes) {
                for (const target of view.getSuccessors(source)) {
                    if (target !== TASK_EXIT && armNodes.has(target)) {
                        continue;
                    }
                    if (target !== TASK_EXIT && !tailNodes.has(target)) {
                        throw new InternalInvariantError(`arm block '${source}' jumps into another arm at '${target}'`, task.getNodes());
                    }
                    continuations.push({ arm, source, target });
                    if (!targets.includes(target)) {
                        targets.push(target);
                    }
                }
            }
        }

        if (targets.length <= 1) {
            let target = targets[0];
            if (target === undefined || target === TASK_EXIT) {
                if (tail.length > 0) {
                    throw new InternalInvariantError('blocks after a branch are not reachable from its arms', tail);
                }
                return undefined;
            }
            this.checkTailReachable(view, target, tail);
            return target;
        }

        let graph = this.context.getGraph();
        let variable = this.context.getScope(task).allocate(ControlVariableKind.TAIL);
        let labels = targets.map((target) => (target === TASK_EXIT ? outside : target));
        let physical: string[] = [];
        for (const label of labels) {
            if (label === undefined) {
                throw new InternalInvariantError('branch continues out of a region without an exit', task.getNodes());
            }
            physical.push(label);
        }
        let dispatch = this.context.createDispatch(BlockKind.SYNTHETIC_TAIL, variable, physical);
        task.getNodes().add(dispatch.getLabel());
        for (const { arm, source, target } of continuations) {
            let index = targets.indexOf(target);
            let assignment = this.context.createAssignment([[variable, index]], dispatch.getLabel());
            graph.redirect(task.getSourceBlock(source), physical[index], assignment.getLabel());
            task.getNodes().add(assignment.getLabel());
            arm.nodes.push(assignment.getLabel());
        }
        tail.unshift(dispatch.getLabel());
        logger.debug(`tail dispatch ${dispatch.getLabel()} on ${variable.getName()} over [${physical.join(', ')}]`);
        return dispatch.getLabel();
    }

    private checkTailReachable(view: TaskGraph, entry: string, tail: string[]): void {
        for (const node of tail) {
            if (!view.reaches(entry, node)) {
                throw new InternalInvariantError(`tail block '${node}' is not reachable from tail entry '${entry}'`, tail);
            }
        }
    }
}
