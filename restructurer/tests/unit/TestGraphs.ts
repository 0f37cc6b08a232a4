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

import { JumpTargetDict, ScfgBuilder } from '../../src/core/graph/builder/ScfgBuilder';
import { Scfg } from '../../src/core/graph/Scfg';
import { BlockNode, LinearRegion, RegionKind, RegionNode } from '../../src/core/region/Region';
import { DecisionOracle } from '../../src/utils/TraceSimulator';

/**
 * Builds a graph from an adjacency list. Blocks without targets are the exits unless `exits` is
 * given.
 */
export function buildGraph(entry: string, blocks: Record<string, JumpTargetDict[]>, exits?: string[]): Scfg {
    let dict: Record<string, { jumpTargets: JumpTargetDict[] }> = {};
    for (const [label, jumpTargets] of Object.entries(blocks)) {
        dict[label] = { jumpTargets };
    }
    return ScfgBuilder.buildFromDict(exits === undefined ? { entry, blocks: dict } : { entry, exits, blocks: dict });
}

export function leaf(label: string, synthetic: boolean = false): BlockNode {
    return { kind: 'block', label, synthetic };
}

export function linear(id: string, ...children: RegionNode[]): LinearRegion {
    return { kind: RegionKind.LINEAR, id, children };
}

/**
 * Answers from a fixed list of decisions per block; the last decision repeats once a list runs out.
 */
export function scriptedOracle(script: Record<string, number[]>): DecisionOracle {
    return (label, visit) => {
        let decisions = script[label];
        if (decisions === undefined || decisions.length === 0) {
            throw new Error(`no decision scripted for '${label}'`);
        }
        return decisions[Math.min(visit, decisions.length - 1)];
    };
}

export const DIAMOND: Record<string, JumpTargetDict[]> = {
    entry: ['A', 'B'],
    A: ['C'],
    B: ['C'],
    C: [],
};

export const NATURAL_LOOP: Record<string, JumpTargetDict[]> = {
    entry: ['header'],
    header: ['body'],
    body: ['header', 'exit'],
    exit: [],
};

export const WHILE_LOOP: Record<string, JumpTargetDict[]> = {
    entry: ['header'],
    header: ['body', 'exit'],
    body: ['header'],
    exit: [],
};

export const WHILE_WITH_BRANCH: Record<string, JumpTargetDict[]> = {
    entry: ['h'],
    h: ['a', 'x'],
    a: ['b', 'c'],
    b: ['l'],
    c: ['l'],
    l: ['h'],
    x: [],
};

export const IRREDUCIBLE: Record<string, JumpTargetDict[]> = {
    entry: ['H1', 'H2'],
    H1: ['H2'],
    H2: ['H1', 'exit'],
    exit: [],
};

export const TWO_EXIT_LOOP: Record<string, JumpTargetDict[]> = {
    entry: ['h'],
    h: ['b', 'x1'],
    b: ['h', 'x2'],
    x1: [],
    x2: [],
};

export const DIAMOND_IN_LOOP: Record<string, JumpTargetDict[]> = {
    entry: ['h'],
    h: ['a', 'b'],
    a: ['c'],
    b: ['c'],
    c: ['h', 'exit'],
    exit: [],
};

export const CROSSED_ARMS: Record<string, JumpTargetDict[]> = {
    entry: ['A', 'B'],
    A: ['C', 'D'],
    B: ['C', 'D'],
    C: ['E'],
    D: ['E'],
    E: [],
};

export const NESTED_LOOPS: Record<string, JumpTargetDict[]> = {
    entry: ['o'],
    o: ['i'],
    i: ['i', 'l'],
    l: ['o', 'x'],
    x: [],
};

export const SEQUENTIAL_LOOPS: Record<string, JumpTargetDict[]> = {
    entry: ['a', 'b'],
    a: ['b'],
    b: ['a', 'c'],
    c: ['d'],
    d: ['c', 'x'],
    x: [],
};

/**
 * Deterministic generator of numbers in [0, 1) (mulberry32).
 */
export function seededRandom(seed: number): () => number {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

export interface GeneratedGraph {
    scfg: Scfg;
    /** Block index of every label, `b<index>`. */
    indexOf: (label: string) => number;
}

/**
 * A valid graph of 3 to 16 blocks `b0..bn` with 1 to 3 exits at the highest indices. Every block is
 * reached from `b0` through a lower block, and every other block has an edge to a higher one, so
 * always taking the edge to the highest target ends at an exit. Extra edges point anywhere and make
 * loops; about half of the conditional blocks give their own discriminants.
 */
export function generateGraph(random: () => number): GeneratedGraph {
    let pick = (n: number): number => Math.floor(random() * n);
    let size = 3 + pick(14);
    let exitCount = 1 + pick(Math.min(3, size - 1));
    let inner = size - exitCount;
    let targets: number[][] = [];
    for (let i = 0; i < size; i++) {
        targets.push([]);
    }
    let addEdge = (from: number, to: number): void => {
        if (!targets[from].includes(to)) {
            targets[from].push(to);
        }
    };
    for (let i = 1; i < size; i++) {
        addEdge(pick(Math.min(i, inner)), i);
    }
    for (let i = 0; i < inner; i++) {
        if (!targets[i].some((target) => target > i)) {
            addEdge(i, i + 1 + pick(size - i - 1));
        }
        let extra = pick(3);
        for (let k = 0; k < extra; k++) {
            addEdge(i, pick(size));
        }
    }

    let blocks: Record<string, JumpTargetDict[]> = {};
    for (let i = 0; i < size; i++) {
        let list = targets[i];
        let explicit = list.length > 1 && pick(2) === 0;
        blocks[`b${i}`] = list.map((target, k) => {
            if (!explicit) {
                return `b${target}`;
            }
            return { target: `b${target}`, discriminant: (list.length - k) * 2 + pick(2) };
        });
    }
    let exits: string[] = [];
    for (let i = inner; i < size; i++) {
        exits.push(`b${i}`);
    }
    return { scfg: buildGraph('b0', blocks, exits), indexOf: (label) => Number(label.slice(1)) };
}

/**
 * Takes a random edge for the first `randomVisits` visits of a block and the edge to its highest
 * target afterwards, so every run ends.
 */
export function boundedOracle(generated: GeneratedGraph, random: () => number, randomVisits: number = 3): DecisionOracle {
    let decisions = new Map<string, number[]>();
    let forward = new Map<string, number>();
    for (const label of generated.scfg.getLabels()) {
        let jumpTargets = generated.scfg.successors(label);
        if (jumpTargets.length < 2) {
            continue;
        }
        let values: number[] = [];
        let highest = jumpTargets[0];
        for (const jt of jumpTargets) {
            values.push(jt.discriminant ?? 0);
            if (generated.indexOf(jt.target) > generated.indexOf(highest.target)) {
                highest = jt;
            }
        }
        let script: number[] = [];
        for (let visit = 0; visit < randomVisits; visit++) {
            script.push(values[Math.floor(random() * values.length)]);
        }
        decisions.set(label, script);
        forward.set(label, highest.discriminant ?? 0);
    }
    return (label, visit) => {
        let script = decisions.get(label);
        let last = forward.get(label);
        if (script === undefined || last === undefined) {
            throw new Error(`no decision for '${label}'`);
        }
        return visit < script.length ? script[visit] : last;
    };
}
