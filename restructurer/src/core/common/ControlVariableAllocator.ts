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

export enum ControlVariableKind {
    HEAD = 'head',
    EXIT = 'exit',
    BACKEDGE = 'backedge',
    TAIL = 'tail',
}

export interface VariableAssignment {
    readonly site: string;
    readonly value: number;
}

/**
 * A synthetic integer slot. Assignment blocks write it right before a restructured jump and the
 * dispatch sites read it to pick their outgoing edge.
 */
export class ControlVariable {
    private name: string;
    private index: number;
    private kind: ControlVariableKind;
    private dispatchSites: string[] = [];
    private assignments: VariableAssignment[] = [];

    constructor(name: string, index: number, kind: ControlVariableKind) {
        this.name = name;
        this.index = index;
        this.kind = kind;
    }

    public getName(): string {
        return this.name;
    }

    public getIndex(): number {
        return this.index;
    }

    public getKind(): ControlVariableKind {
        return this.kind;
    }

    public getDispatchSites(): readonly string[] {
        return this.dispatchSites;
    }

    public addDispatchSite(site: string): void {
        this.dispatchSites.push(site);
    }

    public getAssignments(): readonly VariableAssignment[] {
        return this.assignments;
    }

    public addAssignment(site: string, value: number): void {
        this.assignments.push({ site, value });
    }
}

/**
 * Variables introduced while restructuring one region. Indices start after everything the enclosing
 * scopes allocated, so a nested region never reuses a variable that is live around it, while
 * sibling regions share indices.
 */
export class VariableScope {
    private prefix: string;
    private base: number;
    private variables: ControlVariable[] = [];

    constructor(prefix: string, base: number) {
        this.prefix = prefix;
        this.base = base;
    }

    public allocate(kind: ControlVariableKind): ControlVariable {
        let index = this.base + this.variables.length;
        let variable = new ControlVariable(`${this.prefix}${index}`, index, kind);
        this.variables.push(variable);
        return variable;
    }

    public getBase(): number {
        return this.base;
    }

    public getNextIndex(): number {
        return this.base + this.variables.length;
    }

    public getVariables(): readonly ControlVariable[] {
        return this.variables;
    }
}

export class ControlVariableAllocator {
    private prefix: string;
    private scopes: Map<number, VariableScope> = new Map();
    private regions: Map<number, string> = new Map();
    private variableRegions: Map<ControlVariable, string> = new Map();

    constructor(prefix: string) {
        this.prefix = prefix;
    }

    /**
     * Opens the scope of `scopeId` nested in `parentScopeId`. The parent must not allocate after
     * its children were opened.
     */
    public openScope(scopeId: number, parentScopeId?: number): VariableScope {
        let parent = parentScopeId === undefined ? undefined : this.scopes.get(parentScopeId);
        let scope = new VariableScope(this.prefix, parent ? parent.getNextIndex() : 0);
        this.scopes.set(scopeId, scope);
        return scope;
    }

    public getScope(scopeId: number): VariableScope | undefined {
        return this.scopes.get(scopeId);
    }

    /**
     * Records which region the variables of a scope belong to.
     */
    public bindRegion(scopeId: number, regionId: string): void {
        this.regions.set(scopeId, regionId);
    }

    /**
     * Files `variable` under a region nested in the one of its scope, when every read and write
     * of it stays inside that region. Its index stays reserved in the scope.
     */
    public assignRegion(variable: ControlVariable, regionId: string): void {
        this.variableRegions.set(variable, regionId);
    }

    /**
     * Allocations keyed by owning region id, in scope creation then allocation order. Regions
     * without variables are left out.
     */
    public getTable(): Map<string, readonly ControlVariable[]> {
        let table = new Map<string, ControlVariable[]>();
        for (const [scopeId, scope] of this.scopes) {
            let scopeRegion = this.regions.get(scopeId);
            for (const variable of scope.getVariables()) {
                let regionId = this.variableRegions.get(variable) ?? scopeRegion;
                if (regionId === undefined) {
                    continue;
                }
                let list = table.get(regionId) ?? [];
                list.push(variable);
                table.set(regionId, list);
            }
        }
        return table;
    }

    /**
     * Number of distinct variable names in use.
     */
    public getVariableCount(): number {
        let names = new Set<string>();
        for (const scope of this.scopes.values()) {
            for (const variable of scope.getVariables()) {
                names.add(variable.getName());
            }
        }
        return names.size;
    }
}
