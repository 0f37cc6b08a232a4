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

import { describe, expect, it } from 'vitest';
import { ControlVariableAllocator, ControlVariableKind } from '../../src/core/common/ControlVariableAllocator';
import { NameGenerator } from '../../src/core/common/NameGenerator';
import { BlockKind } from '../../src/core/graph/BasicBlock';

describe('ControlVariableAllocator', () => {
    it('starts nested scopes after their parent and lets siblings share indices', () => {
        let allocator = new ControlVariableAllocator('cv');
        let root = allocator.openScope(0);
        expect(root.allocate(ControlVariableKind.HEAD).getName()).toBe('cv0');
        expect(root.allocate(ControlVariableKind.BACKEDGE).getName()).toBe('cv1');

        let left = allocator.openScope(1, 0);
        let right = allocator.openScope(2, 0);
        expect(left.getBase()).toBe(2);
        expect(left.allocate(ControlVariableKind.TAIL).getName()).toBe('cv2');
        expect(right.allocate(ControlVariableKind.EXIT).getName()).toBe('cv2');

        let nested = allocator.openScope(3, 1);
        expect(nested.allocate(ControlVariableKind.TAIL).getIndex()).toBe(3);
        expect(allocator.getVariableCount()).toBe(4);
    });

    it('keys the table by region and leaves out empty scopes', () => {
        let allocator = new ControlVariableAllocator('v');
        let root = allocator.openScope(0);
        allocator.openScope(1, 0);
        let variable = root.allocate(ControlVariableKind.TAIL);
        variable.addDispatchSite('tail_0');
        variable.addAssignment('assign_0', 1);
        allocator.bindRegion(0, 'branch_0');
        allocator.bindRegion(1, 'linear_1');

        let table = allocator.getTable();
        expect(Array.from(table.keys())).toEqual(['branch_0']);
        let [only] = table.get('branch_0') ?? [];
        expect(only.getName()).toBe('v0');
        expect(only.getKind()).toBe(ControlVariableKind.TAIL);
        expect(only.getDispatchSites()).toEqual(['tail_0']);
        expect(only.getAssignments()).toEqual([{ site: 'assign_0', value: 1 }]);
    });
});

describe('NameGenerator', () => {
    it('counts per block kind and skips labels already taken', () => {
        let taken = new Set(['synth_assign_1']);
        let names = new NameGenerator('synth_', (label) => taken.has(label));
        expect(names.newLabel(BlockKind.SYNTHETIC_ASSIGNMENT)).toBe('synth_assign_0');
        expect(names.newLabel(BlockKind.SYNTHETIC_ASSIGNMENT)).toBe('synth_assign_2');
        expect(names.newLabel(BlockKind.SYNTHETIC_EXITING_LATCH)).toBe('synth_exiting_latch_0');
        expect(names.newLabel(BlockKind.SYNTHETIC_ASSIGNMENT)).toBe('synth_assign_3');
    });
});
