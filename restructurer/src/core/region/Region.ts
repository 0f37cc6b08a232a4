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

export enum RegionKind {
    LINEAR = 'linear',
    BRANCH = 'branch',
    LOOP = 'loop',
}

/**
 * Leaf of the region tree: one block of the restructured graph.
 */
export interface BlockNode {
    readonly kind: 'block';
    readonly label: string;
    readonly synthetic: boolean;
}

/**
 * Children executed one after another. Each child transfers control to the entry of the next.
 */
export interface LinearRegion {
    readonly kind: RegionKind.LINEAR;
    readonly id: string;
    readonly children: readonly RegionNode[];
}

export interface BranchArm {
    /** Values of the head's conditional edges that select this arm, ascending. */
    readonly discriminants: readonly number[];
    readonly region: Region;
}

/**
 * A head ending in a conditional jump, one arm per distinct successor and the tail every arm
 * continues to. A branch that leaves its enclosing region directly has no tail.
 */
export interface BranchRegion {
    readonly kind: RegionKind.BRANCH;
    readonly id: string;
    readonly head: LinearRegion;
    readonly arms: readonly BranchArm[];
    readonly tail?: Region;
}

/**
 * A loop with a single header and a single latch; back edges never cross the region boundary.
 * Without a `guard` the header is the first block of `body` and the latch either jumps back to it
 * or leaves the loop. With a `guard` the header block runs before every pass through `body` and
 * either enters it or leaves the loop, and the latch only jumps back. `exits` are the original exit
 * targets, indexed by the value of `exitVariable` when there is more than one.
 */
export interface LoopRegion {
    readonly kind: RegionKind.LOOP;
    readonly id: string;
    readonly header: string;
    readonly latch: string;
    readonly guard?: BlockNode;
    readonly body: Region;
    readonly backedgeVariable?: string;
    readonly exitVariable?: string;
    readonly exits: readonly string[];
}

export type Region = LinearRegion | BranchRegion | LoopRegion;
export type RegionNode = BlockNode | Region;

export interface RegionVisitor<T> {
    visitBlock(node: BlockNode): T;
    visitLinear(region: LinearRegion): T;
    visitBranch(region: BranchRegion): T;
    visitLoop(region: LoopRegion): T;
}

export function visitRegion<T>(node: RegionNode, visitor: RegionVisitor<T>): T {
    switch (node.kind) {
        case 'block':
            return visitor.visitBlock(node);
        case RegionKind.LINEAR:
            return visitor.visitLinear(node);
        case RegionKind.BRANCH:
            return visitor.visitBranch(node);
        case RegionKind.LOOP:
            return visitor.visitLoop(node);
        default: {
            const unreachable: never = node;
            return unreachable;
        }
    }
}

/**
 * Direct children in execution order: the head, then the arms, then the tail of a branch; the guard
 * and the body of a loop.
 */
export function getRegionChildren(node: RegionNode): RegionNode[] {
    return visitRegion<RegionNode[]>(node, {
        visitBlock: () => [],
        visitLinear: (region) => [...region.children],
        visitBranch: (region) => {
            let children: RegionNode[] = [region.head, ...region.arms.map((arm) => arm.region)];
            if (region.tail) {
                children.push(region.tail);
            }
            return children;
        },
        visitLoop: (region) => (region.guard ? [region.guard, region.body] : [region.body]),
    });
}

export type RegionTraversalCallback = (node: RegionNode, depth: number) => void;

/**
 * Preorder walk with an explicit stack, so deeply nested trees do not exhaust the call stack.
 */
export function walkRegion(root: RegionNode, callback: RegionTraversalCallback): void {
    let stack: { node: RegionNode; depth: number }[] = [{ node: root, depth: 0 }];
    while (stack.length > 0) {
        let item = stack.pop();
        if (item === undefined) {
            break;
        }
        callback(item.node, item.depth);
        let children = getRegionChildren(item.node);
        for (let i = children.length - 1; i >= 0; i--) {
            stack.push({ node: children[i], depth: item.depth + 1 });
        }
    }
}

/**
 * Label of the block control enters a region through.
 */
export function getEntryLabel(node: RegionNode): string {
    let current: RegionNode = node;
    for (;;) {
        switch (current.kind) {
            case 'block':
                return current.label;
            case RegionKind.LOOP:
                return current.header;
            case RegionKind.BRANCH:
                current = current.head;
                break;
            case RegionKind.LINEAR:
                if (current.children.length === 0) {
                    throw new Error(`linear region ${current.id} is empty`);
                }
                current = current.children[0];
                break;
        }
    }
}

/**
 * Leaf labels in preorder.
 */
export function collectBlockLabels(root: RegionNode): string[] {
    let labels: string[] = [];
    walkRegion(root, (node) => {
        if (node.kind === 'block') {
            labels.push(node.label);
        }
    });
    return labels;
}

export function findRegion(root: RegionNode, id: string): Region | undefined {
    let found: Region | undefined;
    walkRegion(root, (node) => {
        if (found === undefined && node.kind !== 'block' && node.id === id) {
            found = node;
        }
    });
    return found;
}
