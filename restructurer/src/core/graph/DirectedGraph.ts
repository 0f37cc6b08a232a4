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

/**
 * @category core/graph
 * Read-only adjacency view shared by the graph analyses. Nodes are compared by identity.
 */
export interface DirectedGraph<N> {
    getRoot(): N;
    getSuccessors(node: N): readonly N[];
    getPredecessors(node: N): readonly N[];
}

/**
 * The same graph with every edge reversed, rooted at `root`. Postdominators are the dominators of
 * this view.
 */
export class ReversedGraph<N> implements DirectedGraph<N> {
    private graph: DirectedGraph<N>;
    private root: N;

    constructor(graph: DirectedGraph<N>, root: N) {
        this.graph = graph;
        this.root = root;
    }

    public getRoot(): N {
        return this.root;
    }

    public getSuccessors(node: N): readonly N[] {
        return this.graph.getPredecessors(node);
    }

    public getPredecessors(node: N): readonly N[] {
        return this.graph.getSuccessors(node);
    }
}
