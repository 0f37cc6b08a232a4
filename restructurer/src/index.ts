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

// core/common
export * from './core/common/RestructureError';
export * from './core/common/ControlVariableAllocator';
export { NameGenerator } from './core/common/NameGenerator';

// core/graph
export { BasicBlock, BlockKind } from './core/graph/BasicBlock';
export type { JumpTarget } from './core/graph/BasicBlock';
export { ReversedGraph } from './core/graph/DirectedGraph';
export type { DirectedGraph } from './core/graph/DirectedGraph';
export { DominanceFinder } from './core/graph/DominanceFinder';
export { DominanceTree } from './core/graph/DominanceTree';
export { Scfg } from './core/graph/Scfg';
export type { EdgeSpec } from './core/graph/Scfg';
export { StronglyConnectedComponents } from './core/graph/StronglyConnectedComponents';
export * from './core/graph/builder/ScfgBuilder';

// core/region
export * from './core/region/Region';

// transformer
export { RegionTreeBuilder, restructure } from './transformer/RegionTreeBuilder';
export type { RestructureResult } from './transformer/RegionTreeBuilder';

// save
export { CodeBuffer } from './save/CodeBuffer';
export { Printer } from './save/Printer';
export { RegionPrinter } from './save/RegionPrinter';
export * from './save/RegionSerializer';

// utils
export { TraceSimulator } from './utils/TraceSimulator';
export type { DecisionOracle } from './utils/TraceSimulator';

export { RestructureConfig } from './Config';
export type { RestructureOptions } from './Config';

import Logger from './utils/logger';
export { Logger };
