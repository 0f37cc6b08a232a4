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

import { BlockKind } from '../graph/BasicBlock';

const KIND_NAMES: Record<BlockKind, string> = {
    [BlockKind.BASIC]: 'block',
    [BlockKind.SYNTHETIC_ENTRY]: 'entry',
    [BlockKind.SYNTHETIC_RETURN]: 'return',
    [BlockKind.SYNTHETIC_ASSIGNMENT]: 'assign',
    [BlockKind.SYNTHETIC_HEAD]: 'head',
    [BlockKind.SYNTHETIC_EXITING_LATCH]: 'exiting_latch',
    [BlockKind.SYNTHETIC_EXIT]: 'exit',
    [BlockKind.SYNTHETIC_TAIL]: 'tail',
    [BlockKind.SYNTHETIC_FILL]: 'fill',
};

/**
 * Hands out labels for synthetic blocks, one counter per block kind, e.g. `synth_assign_3`. A
 * candidate already used by the graph is skipped.
 */
export class NameGenerator {
    private prefix: string;
    private isTaken: (label: string) => boolean;
    private counters: Map<BlockKind, number> = new Map();

    constructor(prefix: string, isTaken: (label: string) => boolean) {
        this.prefix = prefix;
        this.isTaken = isTaken;
    }

    public newLabel(kind: BlockKind): string {
        let counter = this.counters.get(kind) ?? 0;
        let label = `${this.prefix}${KIND_NAMES[kind]}_${counter}`;
        while (this.isTaken(label)) {
            counter++;
            label = `${this.prefix}${KIND_NAMES[kind]}_${counter}`;
        }
        this.counters.set(kind, counter + 1);
        return label;
    }
}
