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

import { DirectedGraph } from './DirectedGraph';

/**
 * Immediate dominators after Cooper, Harvey and Kennedy. Nodes are numbered in reverse postorder
 * from the root so that `intersect` can walk towards smaller indices; nodes not reachable from the
 * root are left out.
 */
export class DominanceFinder<N> {
    private blocks: N[] = [];
    private blockToIdx = new Map<N, number>();
    private idoms: number[] = [];

    constructor(graph: DirectedGraph<N>) {
        this.blocks = DominanceFinder.reversePostOrder(graph);
        for (let i = 0; i < this.blocks.length; i++) {
            this.blockToIdx.set(this.blocks[i], i);
        }

        // calculate immediate dominator for each block
        this.idoms = new Array<number>(this.blocks.length);
        this.idoms[0] = 0;
        for (let i = 1; i < this.idoms.length; i++) {
            this.idoms[i] = -1;
        }
        let isChanged = true;
        while (isChanged) {
            isChanged = false;
            for (let blockIdx = 1; blockIdx < this.blocks.length; blockIdx++) {
                let preds = this.getReachablePredIdxs(graph.getPredecessors(this.blocks[blockIdx]));
                let newIdom = this.getFirstDefinedPredIdx(preds);
                if (newIdom === -1) {
                    continue;
                }
                for (const predIdx of preds) {
                    if (this.idoms[predIdx] !== -1) {
                        newIdom = this.intersect(newIdom, predIdx);
                    }
                }
                if (this.idoms[blockIdx] !== newIdom) {
                    this.idoms[blockIdx] = newIdom;
                    isChanged = true;
                }
            }
        }
    }

    private static reversePostOrder<N>(graph: DirectedGraph<N>): N[] {
        let root = graph.getRoot();
        let visited = new Set<N>([root]);
        let postOrder: N[] = [];
        let stack: { node: N; next: number }[] = [{ node: root, next: 0 }];
        while (stack.length > 0) {
            let frame = stack[stack.length - 1];
            let succs = graph.getSuccessors(frame.node);
            if (frame.next < succs.length) {
                let succ = succs[frame.next++];
                if (!visited.has(succ)) {
                    visited.add(succ);
                    stack.push({ node: succ, next: 0 });
                }
            } else {
                postOrder.push(frame.node);
                stack.pop();
            }
        }
        return postOrder.reverse();
    }

    public getBlocks(): N[] {
        return this.blocks;
    }

    public getBlockToIdx(): Map<N, number> {
        return this.blockToIdx;
    }

    public getImmediateDominators(): number[] {
        return this.idoms;
    }

    /**
     * @returns undefined for the root and for nodes outside the analysed graph
     */
    public getImmediateDominator(block: N): N | undefined {
        let idx = this.blockToIdx.get(block);
        if (idx === undefined || idx === 0) {
            return undefined;
        }
        return this.blocks[this.idoms[idx]];
    }

    public dominates(a: N, b: N): boolean {
        let aIdx = this.blockToIdx.get(a);
        let bIdx = this.blockToIdx.get(b);
        if (aIdx === undefined || bIdx === undefined) {
            return false;
        }
        while (bIdx !== aIdx && bIdx !== 0) {
            bIdx = this.idoms[bIdx];
        }
        return bIdx === aIdx;
    }

    private getReachablePredIdxs(preds: readonly N[]): number[] {
        let idxs: number[] = [];
        for (const pred of preds) {
            let idx = this.blockToIdx.get(pred);
            if (idx !== undefined) {
                idxs.push(idx);
            }
        }
        return idxs;
    }

    private getFirstDefinedPredIdx(preds: number[]): number {
        for (const idx of preds) {
            if (this.idoms[idx] !== -1) {
                return idx;
            }
        }
        return -1;
    }

    private intersect(a: number, b: number): number {
        while (a !== b) {
            if (a > b) {
                a = this.idoms[a];
            } else {
                b = this.idoms[b];
            }
        }
        return a;
    }
}
