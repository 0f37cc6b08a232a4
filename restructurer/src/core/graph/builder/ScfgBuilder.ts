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

import fs from 'fs';
import { EdgeSpec, Scfg } from '../Scfg';
import { MalformedGraphError, RestructureErrorCode } from '../../common/RestructureError';
import Logger, { LOG_MODULE_TYPE } from '../../../utils/logger';
const logger = Logger.getLogger(LOG_MODULE_TYPE.RESTRUCTURER, 'ScfgBuilder');

export type JumpTargetDict = string | { target: string; discriminant?: number };

export interface BlockDict {
    jumpTargets: JumpTargetDict[];
}

/**
 * Serializable shape of an SCFG as handed over by a front-end. When `exits` is omitted the blocks
 * without jump targets are the exits.
 */
export interface ScfgDict {
    entry: string;
    exits?: string[];
    blocks: Record<string, BlockDict>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatError(message: string): MalformedGraphError {
    logger.error(message);
    return new MalformedGraphError(RestructureErrorCode.GRAPH_INVALID_FORMAT, message);
}

export class ScfgBuilder {
    public static buildFromDict(dict: ScfgDict): Scfg {
        let labels = Object.keys(dict.blocks);
        let edges: EdgeSpec[] = [];
        for (const label of labels) {
            for (const jt of dict.blocks[label].jumpTargets) {
                if (typeof jt === 'string') {
                    edges.push({ source: label, target: jt });
                } else {
                    edges.push({ source: label, target: jt.target, discriminant: jt.discriminant });
                }
            }
        }
        let exits = dict.exits ?? labels.filter((label) => dict.blocks[label].jumpTargets.length === 0);
        return Scfg.create(labels, edges, dict.entry, exits);
    }

    public static buildFromJson(jsonPath: string): Scfg {
        if (!fs.existsSync(jsonPath)) {
            throw formatError(`graph file ${jsonPath} does not exist`);
        }
        let text = fs.readFileSync(jsonPath, 'utf-8');
        let value: unknown;
        try {
            value = JSON.parse(text);
        } catch (error) {
            throw formatError(`graph file ${jsonPath} is not valid JSON: ${error}`);
        }
        return ScfgBuilder.buildFromDict(ScfgBuilder.parseDict(value));
    }

    /**
     * Narrows an untyped JSON value to the dict shape.
     */
    public static parseDict(value: unknown): ScfgDict {
        if (!isRecord(value)) {
            throw formatError('graph must be a JSON object');
        }
        let entry = value.entry;
        if (typeof entry !== 'string') {
            throw formatError('graph entry must be a string');
        }
        let exits: string[] | undefined;
        if (value.exits !== undefined) {
            if (!Array.isArray(value.exits) || !value.exits.every((exit): exit is string => typeof exit === 'string')) {
                throw formatError('graph exits must be an array of labels');
            }
            exits = value.exits;
        }
        if (!isRecord(value.blocks)) {
            throw formatError('graph blocks must be an object keyed by label');
        }

        let blocks: Record<string, BlockDict> = {};
        for (const [label, block] of Object.entries(value.blocks)) {
            if (!isRecord(block) || !Array.isArray(block.jumpTargets)) {
                throw formatError(`block '${label}' must carry a jumpTargets array`);
            }
            let jumpTargets: JumpTargetDict[] = [];
            for (const jt of block.jumpTargets) {
                jumpTargets.push(ScfgBuilder.parseJumpTarget(label, jt));
            }
            blocks[label] = { jumpTargets };
        }
        return exits === undefined ? { entry, blocks } : { entry, exits, blocks };
    }

    private static parseJumpTarget(label: string, jt: unknown): JumpTargetDict {
        if (typeof jt === 'string') {
            return jt;
        }
        if (isRecord(jt) && typeof jt.target === 'string') {
            if (jt.discriminant === undefined) {
                return { target: jt.target };
            }
            if (typeof jt.discriminant === 'number') {
                return { target: jt.target, discriminant: jt.discriminant };
            }
        }
        throw formatError(`block '${label}' has a malformed jump target`);
    }

    public static toDict(scfg: Scfg): ScfgDict {
        let blocks: Record<string, BlockDict> = {};
        for (const block of scfg.getBlocks()) {
            blocks[block.getLabel()] = {
                jumpTargets: block
                    .getJumpTargets()
                    .map((jt) => (jt.discriminant === undefined ? jt.target : { target: jt.target, discriminant: jt.discriminant })),
            };
        }
        return { entry: scfg.getEntry(), exits: [...scfg.getExits()], blocks };
    }
}
