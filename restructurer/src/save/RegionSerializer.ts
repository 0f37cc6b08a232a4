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

import { ControlVariable, ControlVariableKind } from '../core/common/ControlVariableAllocator';
import { ScfgBuilder, ScfgDict } from '../core/graph/builder/ScfgBuilder';
import { BlockNode, RegionKind, RegionNode, visitRegion } from '../core/region/Region';
import { RestructureResult } from '../transformer/RegionTreeBuilder';

export interface BlockNodeDict {
    kind: 'block';
    label: string;
    synthetic: boolean;
}

export interface LinearRegionDict {
    kind: RegionKind.LINEAR;
    id: string;
    children: RegionNodeDict[];
}

export interface BranchRegionDict {
    kind: RegionKind.BRANCH;
    id: string;
    head: RegionNodeDict;
    arms: { discriminants: number[]; region: RegionNodeDict }[];
    tail?: RegionNodeDict;
}

export interface LoopRegionDict {
    kind: RegionKind.LOOP;
    id: string;
    header: string;
    latch: string;
    backedgeVariable?: string;
    exitVariable?: string;
    exits: string[];
    guard?: BlockNodeDict;
    body: RegionNodeDict;
}

export type RegionNodeDict = BlockNodeDict | LinearRegionDict | BranchRegionDict | LoopRegionDict;

export interface ControlVariableDict {
    name: string;
    kind: ControlVariableKind;
    dispatchSites: string[];
    assignments: { site: string; value: number }[];
}

export interface RestructureResultDict {
    region: RegionNodeDict;
    graph: ScfgDict;
    variables: Record<string, ControlVariableDict[]>;
}

/**
 * Converts region trees and restructuring results to plain JSON-compatible objects.
 */
export class RegionSerializer {
    public static toDict(node: RegionNode): RegionNodeDict {
        return visitRegion<RegionNodeDict>(node, {
            visitBlock: (block) => RegionSerializer.blockToDict(block),
            visitLinear: (region) => ({
                kind: RegionKind.LINEAR,
                id: region.id,
                children: region.children.map((child) => RegionSerializer.toDict(child)),
            }),
            visitBranch: (region) => {
                let dict: BranchRegionDict = {
                    kind: RegionKind.BRANCH,
                    id: region.id,
                    head: RegionSerializer.toDict(region.head),
                    arms: region.arms.map((arm) => ({
                        discriminants: [...arm.discriminants],
                        region: RegionSerializer.toDict(arm.region),
                    })),
                };
                if (region.tail) {
                    dict.tail = RegionSerializer.toDict(region.tail);
                }
                return dict;
            },
            visitLoop: (region) => {
                let dict: LoopRegionDict = {
                    kind: RegionKind.LOOP,
                    id: region.id,
                    header: region.header,
                    latch: region.latch,
                    exits: [...region.exits],
                    body: RegionSerializer.toDict(region.body),
                };
                if (region.guard) {
                    dict.guard = RegionSerializer.blockToDict(region.guard);
                }
                if (region.backedgeVariable !== undefined) {
                    dict.backedgeVariable = region.backedgeVariable;
                }
                if (region.exitVariable !== undefined) {
                    dict.exitVariable = region.exitVariable;
                }
                return dict;
            },
        });
    }

    public static blockToDict(block: BlockNode): BlockNodeDict {
        return { kind: 'block', label: block.label, synthetic: block.synthetic };
    }

    public static variableToDict(variable: ControlVariable): ControlVariableDict {
        return {
            name: variable.getName(),
            kind: variable.getKind(),
            dispatchSites: [...variable.getDispatchSites()],
            assignments: variable.getAssignments().map((assignment) => ({ site: assignment.site, value: assignment.value })),
        };
    }

    public static resultToDict(result: RestructureResult): RestructureResultDict {
        let variables: Record<string, ControlVariableDict[]> = {};
        for (const [regionId, list] of result.variables) {
            variables[regionId] = list.map((variable) => RegionSerializer.variableToDict(variable));
        }
        return {
            region: RegionSerializer.toDict(result.region),
            graph: ScfgBuilder.toDict(result.graph),
            variables,
        };
    }
}
