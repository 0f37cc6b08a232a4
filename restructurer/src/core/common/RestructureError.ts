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

export enum RestructureErrorCode {
    OK = 0,
    GRAPH_MISSING_ENTRY = -1,
    GRAPH_DUPLICATE_LABEL = -2,
    GRAPH_UNKNOWN_LABEL = -3,
    GRAPH_DANGLING_BLOCK = -4,
    GRAPH_INVALID_EXIT = -5,
    GRAPH_INVALID_DISCRIMINANT = -6,
    GRAPH_HAS_UNREACHABLE_BLOCK = -7,
    GRAPH_HAS_NON_TERMINATING_BLOCK = -8,
    INTERNAL_INVARIANT_VIOLATED = -9,
    NON_CONVERGENCE = -10,
    SIMULATION_FAILED = -11,
    CONFIG_INVALID_OPTION = -12,
    GRAPH_INVALID_FORMAT = -13,
    CONFIG_FILE_UNREADABLE = -14,
}

/**
 * Result record of a validation step, following the `{errCode, errMsg}` convention of the graph
 * model. `labels` names the blocks the problem was found on.
 */
export interface GraphError {
    errCode: RestructureErrorCode;
    errMsg?: string;
    labels?: string[];
}

export class RestructureError extends Error {
    public readonly errCode: RestructureErrorCode;

    constructor(errCode: RestructureErrorCode, message: string) {
        super(message);
        this.name = new.target.name;
        this.errCode = errCode;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * The input graph violates the SCFG invariants. Raised before any restructuring happens.
 */
export class MalformedGraphError extends RestructureError {
    public readonly labels: readonly string[];

    constructor(errCode: RestructureErrorCode, message: string, labels: string[] = []) {
        super(errCode, message);
        this.labels = labels;
    }

    public static fromGraphError(error: GraphError): MalformedGraphError {
        return new MalformedGraphError(error.errCode, error.errMsg ?? 'malformed graph', error.labels ?? []);
    }
}

/**
 * An algorithmic invariant of the restructuring passes does not hold. `blocks` is the block set the
 * failing step was working on.
 */
export class InternalInvariantError extends RestructureError {
    public readonly blocks: readonly string[];

    constructor(message: string, blocks: Iterable<string>, errCode: RestructureErrorCode = RestructureErrorCode.INTERNAL_INVARIANT_VIOLATED) {
        super(errCode, message);
        this.blocks = Array.from(blocks);
    }
}

export class NonConvergenceError extends InternalInvariantError {
    public readonly rounds: number;

    constructor(rounds: number, blocks: Iterable<string>) {
        super(`restructuring did not converge within ${rounds} rounds`, blocks, RestructureErrorCode.NON_CONVERGENCE);
        this.rounds = rounds;
    }
}

export class SimulationError extends RestructureError {
    constructor(message: string) {
        super(RestructureErrorCode.SIMULATION_FAILED, message);
    }
}
