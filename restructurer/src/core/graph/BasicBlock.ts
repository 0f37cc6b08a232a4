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

export enum BlockKind {
    BASIC = 'basic',
    SYNTHETIC_ENTRY = 'synthetic_entry',
    SYNTHETIC_RETURN = 'synthetic_return',
    SYNTHETIC_ASSIGNMENT = 'synthetic_assignment',
    SYNTHETIC_HEAD = 'synthetic_head',
    SYNTHETIC_EXITING_LATCH = 'synthetic_exiting_latch',
    SYNTHETIC_EXIT = 'synthetic_exit',
    SYNTHETIC_TAIL = 'synthetic_tail',
    SYNTHETIC_FILL = 'synthetic_fill',
}

const DISPATCH_KINDS: ReadonlySet<BlockKind> = new Set([
    BlockKind.SYNTHETIC_HEAD,
    BlockKind.SYNTHETIC_EXITING_LATCH,
    BlockKind.SYNTHETIC_EXIT,
    BlockKind.SYNTHETIC_TAIL,
]);

export interface JumpTarget {
    readonly target: string;
    readonly discriminant?: number;
}

/**
 * @category core/graph
 * A `BasicBlock` is composed of:
 * - Label: a **string** that uniquely identifies the block inside its graph.
 * - Kind: whether the block is original input or one of the synthetic blocks the restructuring
 *   passes insert.
 * - Jump targets: an ordered **array** of outgoing edges, each optionally tagged with the
 *   discriminant value that selects it.
 * - Assignments: for assignment blocks, the control variable values written before the jump.
 * - Variable: for dispatch blocks, the control variable whose value selects the outgoing edge.
 */
export class BasicBlock {
    private label: string;
    private kind: BlockKind;
    private jumpTargets: JumpTarget[] = [];
    private assignments: Map<string, number> = new Map();
    private variable?: string;

    constructor(label: string, kind: BlockKind = BlockKind.BASIC) {
        this.label = label;
        this.kind = kind;
    }

    public getLabel(): string {
        return this.label;
    }

    public getKind(): BlockKind {
        return this.kind;
    }

    public isSynthetic(): boolean {
        return this.kind !== BlockKind.BASIC;
    }

    public isDispatch(): boolean {
        return DISPATCH_KINDS.has(this.kind);
    }

    public getJumpTargets(): readonly JumpTarget[] {
        return this.jumpTargets;
    }

    public addJumpTarget(target: string, discriminant?: number): void {
        this.jumpTargets.push(discriminant === undefined ? { target } : { target, discriminant });
    }

    /**
     * Distinct targets in edge order.
     */
    public getTargets(): string[] {
        let targets: string[] = [];
        for (const jt of this.jumpTargets) {
            if (!targets.includes(jt.target)) {
                targets.push(jt.target);
            }
        }
        return targets;
    }

    /**
     * Points every edge aimed at `from` to `to`, keeping edge order and discriminants.
     * @returns the number of rewritten edges
     */
    public replaceTarget(from: string, to: string): number {
        let replaced = 0;
        this.jumpTargets = this.jumpTargets.map((jt) => {
            if (jt.target !== from) {
                return jt;
            }
            replaced++;
            return jt.discriminant === undefined ? { target: to } : { target: to, discriminant: jt.discriminant };
        });
        return replaced;
    }

    public getAssignments(): ReadonlyMap<string, number> {
        return this.assignments;
    }

    public setAssignment(variable: string, value: number): void {
        this.assignments.set(variable, value);
    }

    public getVariable(): string | undefined {
        return this.variable;
    }

    public setVariable(variable: string): void {
        this.variable = variable;
    }

    public clone(): BasicBlock {
        let block = new BasicBlock(this.label, this.kind);
        block.jumpTargets = [...this.jumpTargets];
        block.assignments = new Map(this.assignments);
        block.variable = this.variable;
        return block;
    }

    public toString(): string {
        let targets = this.jumpTargets.map((jt) => (jt.discriminant === undefined ? jt.target : `${jt.discriminant}:${jt.target}`));
        return `${this.label} -> [${targets.join(', ')}]`;
    }
}
