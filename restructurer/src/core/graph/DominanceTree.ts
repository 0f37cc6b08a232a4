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

import { DominanceFinder } from './DominanceFinder';

export class DominanceTree<N> {
    private blocks: N[] = [];
    private blockToIdx = new Map<N, number>();
    private children: number[][] = [];
    private parents: number[] = [];

    constructor(dominanceFinder: DominanceFinder<N>) {
        this.blocks = dominanceFinder.getBlocks();
        this.blockToIdx = dominanceFinder.getBlockToIdx();
        let idoms = dominanceFinder.getImmediateDominators();

        // build the tree
        let treeSize = this.blocks.length;
        this.children = new Array(treeSize);
        this.parents = new Array(treeSize);
        for (let i = 0; i < treeSize; i++) {
            this.children[i] = [];
            this.parents[i] = -1;
        }
        for (let i = 0; i < treeSize; i++) {
            if (idoms[i] !== i) {
                this.parents[i] = idoms[i];
                this.children[idoms[i]].push(i);
            }
        }
    }

    /**
     * Preorder walk of the subtree rooted at `root`, i.e. every node `root` dominates.
     */
    public getAllNodesDFS(root: N = this.getRoot()): N[] {
        let dfsBlocks = new Array<N>();
        if (!this.blockToIdx.has(root)) {
            return dfsBlocks;
        }
        let stack: N[] = [root];
        while (stack.length !== 0) {
            let curr = stack.pop();
            if (curr === undefined) {
                break;
            }
            dfsBlocks.push(curr);
            let childList = this.getChildren(curr);
            for (let i = childList.length - 1; i >= 0; i--) {
                stack.push(childList[i]);
            }
        }
        return dfsBlocks;
    }

    public getChildren(block: N): N[] {
        let childList = new Array<N>();
        let idx = this.blockToIdx.get(block);
        if (idx === undefined) {
            return childList;
        }
        for (const i of this.children[idx]) {
            childList.push(this.blocks[i]);
        }
        return childList;
    }

    public getParent(block: N): N | undefined {
        let idx = this.blockToIdx.get(block);
        if (idx === undefined || this.parents[idx] === -1) {
            return undefined;
        }
        return this.blocks[this.parents[idx]];
    }

    public getRoot(): N {
        return this.blocks[0];
    }
}
