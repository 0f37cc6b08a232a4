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
import { SimulationError } from '../core/common/RestructureError';
import { BasicBlock, BlockKind } from '../core/graph/BasicBlock';
import { Scfg } from '../core/graph/Scfg';
import { BlockNode, getEntryLabel, LoopRegion, RegionKind, RegionNode, visitRegion } from '../core/region/Region';
import { RestructureResult } from '../transformer/RegionTreeBuilder';
import Logger, { LOG_MODULE_TYPE } from './logger';

const logger = Logger.getLogger(LOG_MODULE_TYPE.TOOL, 'TraceSimulator');

/**
 * Picks the discriminant of the edge an original block takes on its `visit`-th execution
 * (counting from 0). Only consulted for blocks with more than one edge.
 */
export type DecisionOracle = (label: string, visit: number) => number;

interface SimulationState {
    graph: Scfg;
    oracle: DecisionOracle;
    variables: Map<string, number>;
    visits: Map<string, number>;
    trace: string[];
    steps: number;
}

/**
 * Executes graphs and region trees block by block and reports the original blocks visited.
 * Synthetic blocks run their assignments and dispatches but do not show up in traces.
 */
export class TraceSimulator {
    private maxSteps: number;

    constructor(maxSteps: number = new RestructureConfig().getMaxSimulationSteps()) {
        this.maxSteps = maxSteps;
    }

    public runGraph(graph: Scfg, oracle: DecisionOracle): string[] {
        let state = this.newState(graph, oracle);
        let label: string | undefined = graph.getEntry();
        while (label !== undefined) {
            label = this.step(state, label);
        }
        return state.trace;
    }

    /**
     * Walks the region tree of `result`, checking that every transfer of control lands where the
     * tree says it must.
     */
    public runRegion(result: RestructureResult, oracle: DecisionOracle): string[] {
        let state = this.newState(result.graph, oracle);
        let next = this.execute(state, result.region);
        if (next !== undefined) {
            throw this.fail(`control left the root region towards '${next}'`);
        }
        return state.trace;
    }

    private newState(graph: Scfg, oracle: DecisionOracle): SimulationState {
        return { graph, oracle, variables: new Map(), visits: new Map(), trace: [], steps: 0 };
    }

    private execute(state: SimulationState, node: RegionNode): string | undefined {
        return visitRegion<string | undefined>(node, {
            visitBlock: (block) => this.step(state, block.label),
            visitLinear: (region) => {
                let next: string | undefined;
                for (let i = 0; i < region.children.length; i++) {
                    if (i > 0) {
                        this.expectEntry(next, region.children[i], region.id);
                    }
                    next = this.execute(state, region.children[i]);
                }
                return next;
            },
            visitBranch: (region) => {
                let next = this.execute(state, region.head);
                let arm = region.arms.find((candidate) => getEntryLabel(candidate.region) === next);
                if (!arm) {
                    throw this.fail(`branch ${region.id} has no arm starting at '${next}'`);
                }
                next = this.execute(state, arm.region);
                if (region.tail) {
                    this.expectEntry(next, region.tail, region.id);
                    next = this.execute(state, region.tail);
                }
                return next;
            },
            visitLoop: (region) => (region.guard ? this.executeGuarded(state, region, region.guard) : this.executeLatched(state, region)),
        });
    }

    private executeLatched(state: SimulationState, region: LoopRegion): string | undefined {
        let next = this.execute(state, region.body);
        while (next === region.header) {
            next = this.execute(state, region.body);
        }
        return next;
    }

    /**
     * The guard either enters the body or leaves the loop; the body always returns to the guard.
     */
    private executeGuarded(state: SimulationState, region: LoopRegion, guard: BlockNode): string | undefined {
        let bodyEntry = getEntryLabel(region.body);
        for (;;) {
            let next = this.execute(state, guard);
            if (next !== bodyEntry) {
                return next;
            }
            next = this.execute(state, region.body);
            if (next !== region.header) {
                throw this.fail(`body of loop ${region.id} left towards '${next}' instead of its header '${region.header}'`);
            }
        }
    }

    private expectEntry(next: string | undefined, child: RegionNode, regionId: string): void {
        let entry = getEntryLabel(child);
        if (next !== entry) {
            let kind = child.kind === 'block' ? 'block' : child.kind === RegionKind.LOOP ? 'loop' : 'region';
            throw this.fail(`in ${regionId} control reached '${next}' instead of the ${kind} entry '${entry}'`);
        }
    }

    /**
     * Runs one block and returns the label it jumps to, or undefined when it has no edges.
     */
    private step(state: SimulationState, label: string): string | undefined {
        if (++state.steps > this.maxSteps) {
            throw this.fail(`step budget of ${this.maxSteps} exhausted at '${label}'`);
        }
        let block = state.graph.getBlock(label);
        if (!block) {
            throw this.fail(`unknown block '${label}'`);
        }
        if (!block.isSynthetic()) {
            state.trace.push(label);
        }
        let jumpTargets = block.getJumpTargets();
        if (jumpTargets.length === 0) {
            return undefined;
        }
        if (block.getKind() === BlockKind.SYNTHETIC_ASSIGNMENT) {
            for (const [variable, value] of block.getAssignments()) {
                state.variables.set(variable, value);
            }
            return jumpTargets[0].target;
        }
        if (block.isDispatch()) {
            return this.dispatch(state, block);
        }
        if (jumpTargets.length === 1) {
            return jumpTargets[0].target;
        }
        let visit = state.visits.get(label) ?? 0;
        state.visits.set(label, visit + 1);
        let discriminant = state.oracle(label, visit);
        let taken = jumpTargets.find((jt) => jt.discriminant === discriminant);
        if (!taken) {
            throw this.fail(`block '${label}' has no edge for discriminant ${discriminant}`);
        }
        return taken.target;
    }

    private dispatch(state: SimulationState, block: BasicBlock): string {
        let variable = block.getVariable();
        let value = variable === undefined ? undefined : state.variables.get(variable);
        if (variable === undefined || value === undefined) {
            throw this.fail(`dispatch '${block.getLabel()}' reads ${variable ?? 'no variable'} before it is assigned`);
        }
        let taken = block.getJumpTargets().find((jt) => jt.discriminant === value);
        if (!taken) {
            throw this.fail(`dispatch '${block.getLabel()}' has no edge for ${variable} = ${value}`);
        }
        return taken.target;
    }

    private fail(message: string): SimulationError {
        logger.error(message);
        return new SimulationError(message);
    }
}
