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
 * Tarjan's strongly connected components, run with an explicit stack. Roots are tried in the order
 * of `nodes` and successors in the order `successors` returns them; successors outside `nodes` must
 * be filtered by the caller.
 */
export class StronglyConnectedComponents<N> {
    private components: N[][] = [];
    private successors: (node: N) => readonly N[];

    constructor(nodes: readonly N[], successors: (node: N) => readonly N[]) {
        this.successors = successors;
        let index = new Map<N, number>();
        let lowLink = new Map<N, number>();
        let onStack = new Set<N>();
        let stack: N[] = [];
        let counter = 0;

        let visit = (node: N): void => {
            index.set(node, counter);
            lowLink.set(node, counter);
            counter++;
            stack.push(node);
            onStack.add(node);
        };

        for (const root of nodes) {
            if (index.has(root)) {
                continue;
            }
            visit(root);
            let callStack: { node: N; next: number }[] = [{ node: root, next: 0 }];
            while (callStack.length > 0) {
                let frame = callStack[callStack.length - 1];
                let succs = successors(frame.node);
                if (frame.next < succs.length) {
                    let succ = succs[frame.next++];
                    if (!index.has(succ)) {
                        visit(succ);
                        callStack.push({ node: succ, next: 0 });
                    } else if (onStack.has(succ)) {
                        lowLink.set(frame.node, Math.min(this.get(lowLink, frame.node), this.get(index, succ)));
                    }
                    continue;
                }

                callStack.pop();
                if (this.get(lowLink, frame.node) === this.get(index, frame.node)) {
                    let component: N[] = [];
                    let member: N | undefined;
                    do {
                        member = stack.pop();
                        if (member === undefined) {
                            break;
                        }
                        onStack.delete(member);
                        component.push(member);
                    } while (member !== frame.node);
                    this.components.push(component.reverse());
                }
                if (callStack.length > 0) {
                    let parent = callStack[callStack.length - 1].node;
                    lowLink.set(parent, Math.min(this.get(lowLink, parent), this.get(lowLink, frame.node)));
                }
            }
        }
        // Tarjan completes components sinks first
        this.components.reverse();
    }

    private get(map: Map<N, number>, node: N): number {
        return map.get(node) ?? -1;
    }

    /**
     * All components in topological order of the condensation.
     */
    public getComponents(): N[][] {
        return this.components;
    }

    /**
     * Components that contain a cycle: more than one node, or a single node with an edge to itself.
     */
    public getCyclicComponents(): N[][] {
        return this.components.filter(
            (component) => component.length > 1 || this.successors(component[0]).includes(component[0])
        );
    }
}
