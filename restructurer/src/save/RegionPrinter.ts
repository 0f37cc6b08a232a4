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

import { Scfg } from '../core/graph/Scfg';
import { BlockNode, BranchRegion, LinearRegion, LoopRegion, RegionNode, visitRegion } from '../core/region/Region';
import { Printer } from './Printer';

/**
 * Renders a region tree as indented text, one leaf per line. When the restructured graph is given,
 * synthetic leaves show the variable they assign or dispatch on.
 *
 * ```
 * branch branch_0 {
 *   head linear linear_1 {
 *     entry
 *   }
 *   arm 0 linear linear_2 {
 *     A
 *   }
 *   ...
 * }
 * ```
 */
export class RegionPrinter extends Printer {
    private root: RegionNode;
    private graph?: Scfg;

    constructor(root: RegionNode, graph?: Scfg) {
        super();
        this.root = root;
        this.graph = graph;
    }

    public dump(): string {
        this.printer.clear();
        this.printNode(this.root, '');
        return this.printer.toString();
    }

    private printNode(node: RegionNode, role: string): void {
        visitRegion<void>(node, {
            visitBlock: (block) => this.printBlock(block, role),
            visitLinear: (region) => this.printLinear(region, role),
            visitBranch: (region) => this.printBranch(region, role),
            visitLoop: (region) => this.printLoop(region, role),
        });
    }

    private printBlock(node: BlockNode, role: string): void {
        let annotation = this.annotate(node.label);
        this.printer.writeLine(annotation.length > 0 ? `${role}${node.label} (${annotation})` : `${role}${node.label}`);
    }

    private printLinear(region: LinearRegion, role: string): void {
        this.open(`${role}linear ${region.id}`);
        for (const child of region.children) {
            this.printNode(child, '');
        }
        this.close();
    }

    private printBranch(region: BranchRegion, role: string): void {
        this.open(`${role}branch ${region.id}`);
        this.printNode(region.head, 'head ');
        for (const arm of region.arms) {
            this.printNode(arm.region, `arm ${arm.discriminants.join(',')} `);
        }
        if (region.tail) {
            this.printNode(region.tail, 'tail ');
        }
        this.close();
    }

    private printLoop(region: LoopRegion, role: string): void {
        let attrs = [`header=${region.header}`, `latch=${region.latch}`];
        if (region.backedgeVariable !== undefined) {
            attrs.push(`backedge=${region.backedgeVariable}`);
        }
        if (region.exitVariable !== undefined) {
            attrs.push(`exit=${region.exitVariable}`);
        }
        attrs.push(`exits=[${region.exits.join(', ')}]`);
        this.open(`${role}loop ${region.id} ${attrs.join(' ')}`);
        if (region.guard) {
            this.printBlock(region.guard, 'guard ');
        }
        this.printNode(region.body, '');
        this.close();
    }

    private annotate(label: string): string {
        let block = this.graph?.getBlock(label);
        if (!block) {
            return '';
        }
        let parts: string[] = [];
        for (const [variable, value] of block.getAssignments()) {
            parts.push(`${variable} = ${value}`);
        }
        let variable = block.getVariable();
        if (variable !== undefined) {
            parts.push(`switch ${variable}`);
        }
        return parts.join(', ');
    }

    private open(title: string): void {
        this.printer.writeLine(`${title} {`).incIndent();
    }

    private close(): void {
        this.printer.decIndent().writeLine('}');
    }
}
