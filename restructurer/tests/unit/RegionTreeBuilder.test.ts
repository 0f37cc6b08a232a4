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
import { ControlVariableKind } from '../../src/core/common/ControlVariableAllocator';
import { MalformedGraphError, NonConvergenceError, RestructureErrorCode } from '../../src/core/common/RestructureError';
import { Scfg } from '../../src/core/graph/Scfg';
import { BranchRegion, collectBlockLabels, findRegion, LoopRegion, Region, RegionKind } from '../../src/core/region/Region';
import { RegionSerializer } from '../../src/save/RegionSerializer';
import { restructure } from '../../src/transformer/RegionTreeBuilder';
import {
    buildGraph,
    CROSSED_ARMS,
    DIAMOND,
    DIAMOND_IN_LOOP,
    IRREDUCIBLE,
    leaf,
    linear,
    NATURAL_LOOP,
    NESTED_LOOPS,
    SEQUENTIAL_LOOPS,
    TWO_EXIT_LOOP,
    WHILE_LOOP,
    WHILE_WITH_BRANCH,
} from './TestGraphs';

function asBranch(region: Region | undefined): BranchRegion {
    if (region?.kind !== RegionKind.BRANCH) {
        throw new Error(`expected a branch region, got ${region?.kind}`);
    }
    return region;
}

function asLoop(region: Region | undefined): LoopRegion {
    if (region?.kind !== RegionKind.LOOP) {
        throw new Error(`expected a loop region, got ${region?.kind}`);
    }
    return region;
}

describe('RegionTreeBuilder', () => {
    it('turns a diamond into a branch with a tail', () => {
        let result = restructure(buildGraph('entry', DIAMOND));
        expect(result.region).toEqual({
            kind: RegionKind.BRANCH,
            id: 'branch_0',
            head: linear('linear_1', leaf('entry')),
            arms: [
                { discriminants: [0], region: linear('linear_2', leaf('A')) },
                { discriminants: [1], region: linear('linear_3', leaf('B')) },
            ],
            tail: linear('linear_4', leaf('C')),
        });
        expect(result.variables.size).toBe(0);
        expect(result.graph.size()).toBe(4);
    });

    it('keeps a natural loop without synthetic blocks', () => {
        let result = restructure(buildGraph('entry', NATURAL_LOOP));
        expect(result.region).toEqual(
            linear('linear_1', leaf('entry'), {
                kind: RegionKind.LOOP,
                id: 'loop_0',
                header: 'header',
                latch: 'body',
                exits: ['exit'],
                body: linear('linear_2', leaf('header'), leaf('body')),
            }, leaf('exit'))
        );
        expect(result.graph.countSynthetic()).toBe(0);
        expect(result.variables.size).toBe(0);
    });

    it('lets the header of a while loop decide without synthetic blocks', () => {
        let result = restructure(buildGraph('entry', WHILE_LOOP));
        expect(result.region).toEqual(
            linear('linear_1', leaf('entry'), {
                kind: RegionKind.LOOP,
                id: 'loop_0',
                header: 'header',
                latch: 'body',
                guard: leaf('header'),
                exits: ['exit'],
                body: linear('linear_2', leaf('body')),
            }, leaf('exit'))
        );
        expect(result.graph.countSynthetic()).toBe(0);
        expect(result.variables.size).toBe(0);
    });

    it('splits the body of a while loop at its branches', () => {
        let result = restructure(buildGraph('entry', WHILE_WITH_BRANCH));
        expect(result.region).toEqual(
            linear('linear_1', leaf('entry'), {
                kind: RegionKind.LOOP,
                id: 'loop_0',
                header: 'h',
                latch: 'l',
                guard: leaf('h'),
                exits: ['x'],
                body: {
                    kind: RegionKind.BRANCH,
                    id: 'branch_2',
                    head: linear('linear_3', leaf('a')),
                    arms: [
                        { discriminants: [0], region: linear('linear_4', leaf('b')) },
                        { discriminants: [1], region: linear('linear_5', leaf('c')) },
                    ],
                    tail: linear('linear_6', leaf('l')),
                },
            }, leaf('x'))
        );
        expect(result.graph.countSynthetic()).toBe(0);
        expect(result.variables.size).toBe(0);
    });

    it('latches a loop whose header also jumps back to itself', () => {
        let result = restructure(buildGraph('entry', { entry: ['h'], h: ['h', 'b', 'x'], b: ['h'], x: [] }));
        let loop = asLoop(findRegion(result.region, 'loop_0'));
        expect(loop.guard).toBeUndefined();
        expect(loop.latch).toBe('synth_exiting_latch_0');
        expect(loop.backedgeVariable).toBe('cv0');
        expect(Array.from(result.variables.keys())).toEqual(['loop_0']);
        expect((result.variables.get('loop_0') ?? []).map((variable) => variable.getName())).toEqual(['cv0']);
    });

    it('wraps a single block in a linear region', () => {
        let result = restructure(buildGraph('A', { A: [] }));
        expect(result.region).toEqual(linear('linear_0', leaf('A')));
    });

    it('gives a self-looping entry a synthetic entry block', () => {
        let result = restructure(buildGraph('A', { A: ['A', 'B'], B: [] }));
        expect(result.graph.getEntry()).toBe('synth_entry_0');
        expect(result.region).toEqual(
            linear('linear_1', leaf('synth_entry_0', true), {
                kind: RegionKind.LOOP,
                id: 'loop_0',
                header: 'A',
                latch: 'A',
                exits: ['B'],
                body: linear('linear_2', leaf('A')),
            }, leaf('B'))
        );
    });

    it('unifies the headers of an irreducible loop', () => {
        let result = restructure(buildGraph('entry', IRREDUCIBLE));
        let root = asBranch(result.region);
        expect(root.id).toBe('branch_1');
        expect(root.head).toEqual(linear('linear_2', leaf('entry')));
        expect(root.arms).toEqual([
            { discriminants: [0], region: linear('linear_5', leaf('synth_assign_0', true)) },
            { discriminants: [1], region: linear('linear_6', leaf('synth_assign_1', true)) },
        ]);

        let tail = root.tail;
        if (tail?.kind !== RegionKind.LINEAR) {
            throw new Error('expected a linear tail');
        }
        expect(tail.id).toBe('linear_7');
        expect(tail.children[1]).toEqual(leaf('exit'));
        let loop = asLoop(findRegion(result.region, 'loop_0'));
        expect(tail.children[0]).toBe(loop);
        expect(loop.header).toBe('synth_head_0');
        expect(loop.latch).toBe('synth_exiting_latch_0');
        expect(loop.backedgeVariable).toBe('cv1');
        expect(loop.exitVariable).toBeUndefined();
        expect(loop.exits).toEqual(['exit']);

        let body = asBranch(loop.body);
        expect(body.id).toBe('branch_3');
        expect(body.head).toEqual(linear('linear_4', leaf('synth_head_0', true)));
        expect(body.arms[0]).toEqual({ discriminants: [0], region: linear('linear_8', leaf('H1'), leaf('synth_assign_2', true)) });
        expect(body.arms[1]).toEqual({
            discriminants: [1],
            region: {
                kind: RegionKind.BRANCH,
                id: 'branch_9',
                head: linear('linear_10', leaf('H2')),
                arms: [
                    { discriminants: [0], region: linear('linear_12', leaf('synth_assign_3', true)) },
                    { discriminants: [1], region: linear('linear_13', leaf('synth_assign_4', true)) },
                ],
            },
        });
        expect(body.tail).toEqual(linear('linear_11', leaf('synth_exiting_latch_0', true)));
    });

    it('records the control variables of an irreducible loop', () => {
        let result = restructure(buildGraph('entry', IRREDUCIBLE));
        expect(Array.from(result.variables.keys())).toEqual(['branch_1', 'loop_0']);
        let [head] = result.variables.get('branch_1') ?? [];
        let [backedge] = result.variables.get('loop_0') ?? [];
        expect(head.getName()).toBe('cv0');
        expect(head.getKind()).toBe(ControlVariableKind.HEAD);
        expect(head.getDispatchSites()).toEqual(['synth_head_0']);
        expect(head.getAssignments()).toEqual([
            { site: 'synth_assign_0', value: 0 },
            { site: 'synth_assign_1', value: 1 },
            { site: 'synth_assign_2', value: 1 },
            { site: 'synth_assign_3', value: 0 },
        ]);
        expect(backedge.getName()).toBe('cv1');
        expect(backedge.getKind()).toBe(ControlVariableKind.BACKEDGE);
        expect(backedge.getDispatchSites()).toEqual(['synth_exiting_latch_0']);
        expect(backedge.getAssignments()).toEqual([
            { site: 'synth_assign_2', value: 0 },
            { site: 'synth_assign_3', value: 0 },
            { site: 'synth_assign_4', value: 1 },
        ]);

        let graph = result.graph;
        expect(graph.successors('entry')).toEqual([
            { target: 'synth_assign_0', discriminant: 0 },
            { target: 'synth_assign_1', discriminant: 1 },
        ]);
        expect(graph.successors('synth_head_0')).toEqual([
            { target: 'H1', discriminant: 0 },
            { target: 'H2', discriminant: 1 },
        ]);
        expect(graph.successors('synth_exiting_latch_0')).toEqual([
            { target: 'synth_head_0', discriminant: 0 },
            { target: 'exit', discriminant: 1 },
        ]);
        expect(Array.from(graph.getBlock('synth_assign_2')?.getAssignments() ?? [])).toEqual([
            ['cv1', 0],
            ['cv0', 1],
        ]);
    });

    it('dispatches several loop exits through an exit variable', () => {
        let result = restructure(buildGraph('entry', TWO_EXIT_LOOP));
        expect(result.graph.getExits()).toEqual(['synth_return_0']);

        let root = asBranch(result.region);
        expect(root.id).toBe('branch_1');
        let loop = asLoop(findRegion(result.region, 'loop_0'));
        expect(root.head).toEqual(linear('linear_2', leaf('entry'), loop, leaf('synth_exit_0', true)));
        expect(root.arms).toEqual([
            { discriminants: [0], region: linear('linear_5', leaf('x1')) },
            { discriminants: [1], region: linear('linear_6', leaf('x2')) },
        ]);
        expect(root.tail).toEqual(linear('linear_7', leaf('synth_return_0', true)));

        expect(loop.header).toBe('h');
        expect(loop.latch).toBe('synth_exiting_latch_0');
        expect(loop.exits).toEqual(['x1', 'x2']);
        expect(loop.exitVariable).toBe('cv0');
        expect(loop.backedgeVariable).toBe('cv1');
        expect(loop.body).toEqual({
            kind: RegionKind.BRANCH,
            id: 'branch_3',
            head: linear('linear_4', leaf('h')),
            arms: [
                {
                    discriminants: [0],
                    region: {
                        kind: RegionKind.BRANCH,
                        id: 'branch_8',
                        head: linear('linear_9', leaf('b')),
                        arms: [
                            { discriminants: [0], region: linear('linear_12', leaf('synth_assign_1', true)) },
                            { discriminants: [1], region: linear('linear_13', leaf('synth_assign_2', true)) },
                        ],
                    },
                },
                { discriminants: [1], region: linear('linear_10', leaf('synth_assign_0', true)) },
            ],
            tail: linear('linear_11', leaf('synth_exiting_latch_0', true)),
        });

        expect(Array.from(result.variables.keys())).toEqual(['branch_1', 'loop_0']);
        let [exit] = result.variables.get('branch_1') ?? [];
        let [backedge] = result.variables.get('loop_0') ?? [];
        expect(exit.getKind()).toBe(ControlVariableKind.EXIT);
        expect(exit.getDispatchSites()).toEqual(['synth_exit_0']);
        expect(backedge.getKind()).toBe(ControlVariableKind.BACKEDGE);
        expect(Array.from(result.graph.getBlock('synth_assign_2')?.getAssignments() ?? [])).toEqual([
            ['cv1', 1],
            ['cv0', 1],
        ]);
    });

    it('nests a branch inside a loop body', () => {
        let result = restructure(buildGraph('entry', DIAMOND_IN_LOOP));
        expect(result.region).toEqual(
            linear('linear_1', leaf('entry'), {
                kind: RegionKind.LOOP,
                id: 'loop_0',
                header: 'h',
                latch: 'c',
                exits: ['exit'],
                body: {
                    kind: RegionKind.BRANCH,
                    id: 'branch_2',
                    head: linear('linear_3', leaf('h')),
                    arms: [
                        { discriminants: [0], region: linear('linear_4', leaf('a')) },
                        { discriminants: [1], region: linear('linear_5', leaf('b')) },
                    ],
                    tail: linear('linear_6', leaf('c')),
                },
            }, leaf('exit'))
        );
    });

    it('nests natural loops', () => {
        let result = restructure(buildGraph('entry', NESTED_LOOPS));
        expect(result.region).toEqual(
            linear('linear_1', leaf('entry'), {
                kind: RegionKind.LOOP,
                id: 'loop_0',
                header: 'o',
                latch: 'l',
                exits: ['x'],
                body: linear('linear_3', leaf('o'), {
                    kind: RegionKind.LOOP,
                    id: 'loop_2',
                    header: 'i',
                    latch: 'i',
                    exits: ['l'],
                    body: linear('linear_4', leaf('i')),
                }, leaf('l')),
            }, leaf('x'))
        );
    });

    it('collapses consecutive loops of one region separately', () => {
        let result = restructure(buildGraph('entry', SEQUENTIAL_LOOPS));
        let first = asLoop(findRegion(result.region, 'loop_0'));
        let second = asLoop(findRegion(result.region, 'loop_1'));
        expect(first.header).toBe('synth_head_0');
        expect(first.exits).toEqual(['c']);
        expect(second.header).toBe('c');
        expect(second.latch).toBe('d');
        expect(second.backedgeVariable).toBeUndefined();
        let root = asBranch(result.region);
        expect(root.id).toBe('branch_2');
        expect(root.tail).toEqual(linear('linear_9', first, second, leaf('x')));
    });

    it('funnels crossing arms through a tail dispatch', () => {
        let result = restructure(buildGraph('entry', CROSSED_ARMS));
        let root = asBranch(result.region);
        expect(root.id).toBe('branch_0');
        expect(root.arms).toEqual([
            {
                discriminants: [0],
                region: {
                    kind: RegionKind.BRANCH,
                    id: 'branch_2',
                    head: linear('linear_3', leaf('A')),
                    arms: [
                        { discriminants: [0], region: linear('linear_8', leaf('synth_assign_0', true)) },
                        { discriminants: [1], region: linear('linear_9', leaf('synth_assign_1', true)) },
                    ],
                },
            },
            {
                discriminants: [1],
                region: {
                    kind: RegionKind.BRANCH,
                    id: 'branch_4',
                    head: linear('linear_5', leaf('B')),
                    arms: [
                        { discriminants: [0], region: linear('linear_10', leaf('synth_assign_2', true)) },
                        { discriminants: [1], region: linear('linear_11', leaf('synth_assign_3', true)) },
                    ],
                },
            },
        ]);
        expect(root.tail).toEqual({
            kind: RegionKind.BRANCH,
            id: 'branch_6',
            head: linear('linear_7', leaf('synth_tail_0', true)),
            arms: [
                { discriminants: [0], region: linear('linear_12', leaf('C')) },
                { discriminants: [1], region: linear('linear_13', leaf('D')) },
            ],
            tail: linear('linear_14', leaf('E')),
        });

        let [tailVariable] = result.variables.get('branch_0') ?? [];
        expect(tailVariable.getName()).toBe('cv0');
        expect(tailVariable.getKind()).toBe(ControlVariableKind.TAIL);
        expect(tailVariable.getAssignments()).toEqual([
            { site: 'synth_assign_0', value: 0 },
            { site: 'synth_assign_1', value: 1 },
            { site: 'synth_assign_2', value: 0 },
            { site: 'synth_assign_3', value: 1 },
        ]);
    });

    it('fills the empty arm of an if without else', () => {
        let result = restructure(buildGraph('entry', { entry: ['A', 'C'], A: ['C'], C: [] }));
        expect(result.region).toEqual({
            kind: RegionKind.BRANCH,
            id: 'branch_0',
            head: linear('linear_1', leaf('entry')),
            arms: [
                { discriminants: [0], region: linear('linear_2', leaf('A')) },
                { discriminants: [1], region: linear('linear_3', leaf('synth_fill_0', true)) },
            ],
            tail: linear('linear_4', leaf('C')),
        });
        expect(result.graph.successors('synth_fill_0')).toEqual([{ target: 'C' }]);
    });

    it('groups the discriminants of edges sharing a target', () => {
        let result = restructure(
            buildGraph('entry', {
                entry: [
                    { target: 'A', discriminant: 0 },
                    { target: 'B', discriminant: 1 },
                    { target: 'A', discriminant: 2 },
                ],
                A: ['C'],
                B: ['C'],
                C: [],
            })
        );
        let root = asBranch(result.region);
        expect(root.arms.map((arm) => arm.discriminants)).toEqual([[0, 2], [1]]);
    });

    it('places every block of the restructured graph exactly once', () => {
        for (const blocks of [DIAMOND, NATURAL_LOOP, WHILE_LOOP, WHILE_WITH_BRANCH, IRREDUCIBLE, TWO_EXIT_LOOP, DIAMOND_IN_LOOP, CROSSED_ARMS, NESTED_LOOPS, SEQUENTIAL_LOOPS]) {
            let result = restructure(buildGraph('entry', blocks));
            let labels = collectBlockLabels(result.region);
            expect(new Set(labels).size).toBe(labels.length);
            expect([...labels].sort()).toEqual(result.graph.getLabels().sort());
        }
    });

    it('produces the same result on every run', () => {
        let first = RegionSerializer.resultToDict(restructure(buildGraph('entry', IRREDUCIBLE)));
        let second = RegionSerializer.resultToDict(restructure(buildGraph('entry', IRREDUCIBLE)));
        expect(second).toEqual(first);
    });

    it('leaves the input graph untouched', () => {
        let scfg = buildGraph('entry', IRREDUCIBLE);
        restructure(scfg);
        expect(scfg.size()).toBe(4);
        expect(scfg.successors('entry')).toEqual([
            { target: 'H1', discriminant: 0 },
            { target: 'H2', discriminant: 1 },
        ]);
    });

    it('names synthetic blocks and variables with the configured prefixes', () => {
        let result = restructure(buildGraph('entry', IRREDUCIBLE), { syntheticLabelPrefix: 'x_', controlVariablePrefix: 'v' });
        let loop = asLoop(findRegion(result.region, 'loop_0'));
        expect(loop.header).toBe('x_head_0');
        expect(loop.backedgeVariable).toBe('v1');
    });

    it('skips synthetic labels the input already uses', () => {
        let result = restructure(buildGraph('entry', { entry: ['synth_return_0', 'B'], synth_return_0: [], B: [] }));
        expect(result.graph.getExits()).toEqual(['synth_return_1']);
    });

    it('stops when the round limit is exhausted', () => {
        let caught: unknown;
        try {
            restructure(buildGraph('entry', DIAMOND), { maxRounds: 1 });
        } catch (error) {
            caught = error;
        }
        expect(caught).toBeInstanceOf(NonConvergenceError);
        if (caught instanceof NonConvergenceError) {
            expect(caught.errCode).toBe(RestructureErrorCode.NON_CONVERGENCE);
            expect(caught.rounds).toBe(1);
            expect(caught.blocks).toEqual(['A', 'B', 'C']);
        }
    });

    it('rejects a malformed graph before restructuring', () => {
        expect(() => restructure(new Scfg('missing', ['missing']))).toThrow(MalformedGraphError);
    });
});
