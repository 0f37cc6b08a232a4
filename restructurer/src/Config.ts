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
import defaultConfig from '../config/restructurer.json';
import { RestructureError, RestructureErrorCode } from './core/common/RestructureError';
import Logger, { LOG_MODULE_TYPE } from './utils/logger';

const logger = Logger.getLogger(LOG_MODULE_TYPE.RESTRUCTURER, 'Config');

export type RestructureOptionsValue = string | number | boolean | null | undefined;
export interface RestructureOptions {
    syntheticLabelPrefix?: string;
    controlVariablePrefix?: string;
    roundLimitFactor?: number;
    maxRounds?: number;
    maxSimulationSteps?: number;
    [option: string]: RestructureOptionsValue;
}
// emitted to the output directory together with the compiled sources
const DEFAULT_CONFIG_SOURCE = 'config/restructurer.json';

function isOptionsValue(value: unknown): value is RestructureOptionsValue {
    return (
        value === null ||
        value === undefined ||
        typeof value === 'string' ||
        typeof value === 'number' ||
        typeof value === 'boolean'
    );
}

function toOptions(value: unknown, source: string): RestructureOptions {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        throw invalid(`options in ${source} must be a JSON object`);
    }
    let options: RestructureOptions = {};
    for (const [key, option] of Object.entries(value)) {
        if (!isOptionsValue(option)) {
            throw invalid(`option '${key}' in ${source} must be a scalar`);
        }
        options[key] = option;
    }
    return options;
}

/**
 * Copies `options` over `base`. Options left undefined keep the value of `base`.
 */
function overlay(base: RestructureOptions, options: RestructureOptions): RestructureOptions {
    let merged: RestructureOptions = { ...base };
    for (const [key, value] of Object.entries(options)) {
        if (value !== undefined) {
            merged[key] = value;
        }
    }
    return merged;
}

function invalid(message: string, errCode: RestructureErrorCode = RestructureErrorCode.CONFIG_INVALID_OPTION): RestructureError {
    logger.error(message);
    return new RestructureError(errCode, message);
}

export class RestructureConfig {
    private options: RestructureOptions;

    constructor(options?: RestructureOptions) {
        this.options = toOptions(defaultConfig, DEFAULT_CONFIG_SOURCE);
        if (options) {
            this.options = overlay(this.options, options);
        }
        this.validate();
    }

    public getOptions(): RestructureOptions {
        return this.options;
    }

    /**
     * Overlays the options of a JSON file, either a bare options object or `{ "options": {...} }`.
     */
    public buildFromJson(configJsonPath: string): void {
        if (!fs.existsSync(configJsonPath)) {
            throw invalid(`Your configJsonPath: "${configJsonPath}" is not exist.`, RestructureErrorCode.CONFIG_FILE_UNREADABLE);
        }
        let configurations: unknown;
        try {
            configurations = JSON.parse(fs.readFileSync(configJsonPath, 'utf-8'));
        } catch (error) {
            throw invalid(`Error parsing JSON: ${error}`, RestructureErrorCode.CONFIG_FILE_UNREADABLE);
        }
        if (typeof configurations === 'object' && configurations !== null && 'options' in configurations) {
            configurations = configurations.options;
        }
        this.options = overlay(this.options, toOptions(configurations, configJsonPath));
        this.validate();
    }

    public getSyntheticLabelPrefix(): string {
        return this.getString('syntheticLabelPrefix');
    }

    public getControlVariablePrefix(): string {
        return this.getString('controlVariablePrefix');
    }

    public getMaxSimulationSteps(): number {
        return this.getNumber('maxSimulationSteps');
    }

    /**
     * Number of restructuring rounds allowed for a graph of `blockCount` blocks: `maxRounds` when set,
     * `roundLimitFactor * (blockCount + 1)^2` otherwise.
     */
    public getRoundLimit(blockCount: number): number {
        let maxRounds = this.getNumber('maxRounds');
        if (maxRounds > 0) {
            return maxRounds;
        }
        return this.getNumber('roundLimitFactor') * (blockCount + 1) * (blockCount + 1);
    }

    private validate(): void {
        for (const key of ['syntheticLabelPrefix', 'controlVariablePrefix']) {
            let value = this.options[key];
            if (typeof value !== 'string' || value.length === 0) {
                throw invalid(`option '${key}' must be a non-empty string`);
            }
        }
        for (const key of ['roundLimitFactor', 'maxRounds', 'maxSimulationSteps']) {
            let value = this.options[key];
            if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
                throw invalid(`option '${key}' must be a non-negative integer`);
            }
        }
        if (this.getNumber('roundLimitFactor') === 0 && this.getNumber('maxRounds') === 0) {
            throw invalid(`option 'roundLimitFactor' must be positive when 'maxRounds' is 0`);
        }
    }

    private getString(key: string): string {
        let value = this.options[key];
        return typeof value === 'string' ? value : '';
    }

    private getNumber(key: string): number {
        let value = this.options[key];
        return typeof value === 'number' ? value : 0;
    }
}
