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

import { InternalInvariantError } from '../core/common/RestructureError';
import { DirectedGraph } from '../core/graph/DirectedGraph';
import { Scfg } from '../core/graph/Scfg';
import { RestructureTask } from './RestructureContext';

/** Stands for every edge that leaves the task. */
export const TASK_EXIT: unique symbol = Symbol('task-exit');
export type TaskNode = string | typeof TASK_EXIT;

/**
 * Snapshot of a task as a graph over its nodes. Collapsed loops appear as single nodes whose
 * successors are the targets their exiting block leaves the loop for, targets outside the task
 * become `TASK_EXIT` and edges back to the task entry or to the enclosing loop header are dropped.
 */
export class TaskGraph implements DirectedGraph<TaskNode> {
    private task: RestructureTask;
    private successors: Map<TaskNode, TaskNode[]> = new Map();
    private predecessors: Map<TaskNode, TaskNode[]> = new Map();
    private outsideTargets: string[] = [];

    constructor(graph: Scfg, task: RestructureTask) {
        this.task = task;
        this.predecessors.set(TASK_EXIT, []);
        this.successors.set(TASK_EXIT, []);
        for (const node of task.getNodes()) {
            this.predecessors.set(node, []);
        }
        for (const node of task.getNodes()) {
            let succs = this.computeSuccessors(graph, node);
            this.successors.set(node, succs);
            for (const succ of succs) {
                this.predecessors.get(succ)?.push(node);
            }
        }
    }

    private computeSuccessors(graph: Scfg, node: string): TaskNode[] {
        let source = graph.getBlock(this.task.getSourceBlock(node));
        if (!source) {
            throw new InternalInvariantError(`task node '${node}' has no block`, [node]);
        }
        let loop = this.task.getLoops().get(node);
        let jumpTargets = source.getJumpTargets();
        if (jumpTargets.length === 0) {
            return [TASK_EXIT];
        }
        let succs: TaskNode[] = [];
        let backedgeTarget = this.task.getBackedgeTarget();
        for (const jt of jumpTargets) {
            if (jt.target === this.task.getEntry() || jt.target === backedgeTarget) {
                continue;
            }
            if (loop && (jt.target === loop.header || jt.target === loop.bodyEntry)) {
                continue;
            }
            let succ: TaskNode = jt.target;
            if (!this.task.getNodes().has(jt.target)) {
                succ = TASK_EXIT;
                this.addOutsideTarget(jt.target);
            }
            if (!succs.includes(succ)) {
                succs.push(succ);
            }
        }
        // the latch of a guarded loop only jumps back, which ends every pass through the body
        if (succs.length === 0 && backedgeTarget !== undefined && backedgeTarget !== this.task.getEntry()) {
            if (jumpTargets.every((jt) => jt.target === backedgeTarget)) {
                this.addOutsideTarget(backedgeTarget);
                return [TASK_EXIT];
            }
        }
        return succs;
    }

    private addOutsideTarget(target: string): void {
        if (!this.outsideTargets.includes(target)) {
            this.outsideTargets.push(target);
        }
    }

    public getRoot(): TaskNode {
        return this.task.getEntry();
    }

    public getSuccessors(node: TaskNode): readonly TaskNode[] {
        return this.successors.get(node) ?? [];
    }

    public getPredecessors(node: TaskNode): readonly TaskNode[] {
        return this.predecessors.get(node) ?? [];
    }

    public getInternalSuccessors(node: string): string[] {
        let succs: string[] = [];
        for (const succ of this.getSuccessors(node)) {
            if (succ !== TASK_EXIT) {
                succs.push(succ);
            }
        }
        return succs;
    }

    /**
     * Labels outside the task that its edges lead to. A well-formed task has at most one.
     */
    public getOutsideTargets(): readonly string[] {
        return this.outsideTargets;
    }

    /**
     * Task nodes in depth-first preorder from the entry, successors taken in edge order.
     */
    public getPreorder(): string[] {
        let entry = this.task.getEntry();
        let preorder: string[] = [entry];
        let visited = new Set<string>(preorder);
        let stack: { node: string; next: number }[] = [{ node: entry, next: 0 }];
        while (stack.length > 0) {
            let frame = stack[stack.length - 1];
            let succs = this.getInternalSuccessors(frame.node);
            if (frame.next >= succs.length) {
                stack.pop();
                continue;
            }
            let succ = succs[frame.next++];
            if (!visited.has(succ)) {
                visited.add(succ);
                preorder.push(succ);
                stack.push({ node: succ, next: 0 });
            }
        }
        return preorder;
    }

    public reaches(from: string, to: string): boolean {
        let visited = new Set<string>();
        let stack = [from];
        while (stack.length > 0) {
            let node = stack.pop();
            if (node === undefined || visited.has(node)) {
                continue;
            }
            if (node === to) {
                return true;
            }
            visited.add(node);
            stack.push(...this.getInternalSuccessors(node));
        }
        return false;
    }
}
