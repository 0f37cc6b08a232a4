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

import type { Configuration, Logger } from 'log4js';
import { configure, getLogger } from 'log4js';

export enum LOG_LEVEL {
    OFF = 'OFF',
    ERROR = 'ERROR',
    WARN = 'WARN',
    INFO = 'INFO',
    DEBUG = 'DEBUG',
    TRACE = 'TRACE',
}

export enum LOG_MODULE_TYPE {
    DEFAULT = 'default',
    RESTRUCTURER = 'Restructurer',
    TOOL = 'Tool',
}

export default class ConsoleLogger {
    /**
     * Routes the restructurer and tool categories to a synchronous log file when a path is
     * given, and to the console otherwise.
     */
    public static configure(
        logFilePath?: string,
        restructurerLevel: LOG_LEVEL = LOG_LEVEL.ERROR,
        toolLevel: LOG_LEVEL = LOG_LEVEL.INFO
    ): void {
        const appenders: Configuration['appenders'] = {
            console: {
                type: 'console',
                layout: {
                    type: 'pattern',
                    pattern: '[%d] [%p] [%X{module}] - [%X{tag}] %m',
                },
            },
        };
        let target = 'console';
        if (logFilePath) {
            appenders.file = {
                type: 'fileSync',
                filename: `${logFilePath}`,
                maxLogSize: 5 * 1024 * 1024,
                backups: 5,
                encoding: 'utf-8',
                layout: {
                    type: 'pattern',
                    pattern: '[%d] [%p] [%z] [%X{module}] - [%X{tag}] %m',
                },
            };
            target = 'file';
        }
        configure({
            appenders: appenders,
            categories: {
                default: {
                    appenders: ['console'],
                    level: 'info',
                    enableCallStack: false,
                },
                Restructurer: {
                    appenders: [target],
                    level: restructurerLevel,
                    enableCallStack: true,
                },
                Tool: {
                    appenders: [target],
                    level: toolLevel,
                    enableCallStack: true,
                },
            },
        });
    }

    public static getLogger(log_type: LOG_MODULE_TYPE, tag: string = '-'): Logger {
        let logger;
        if (log_type === LOG_MODULE_TYPE.DEFAULT || log_type === LOG_MODULE_TYPE.RESTRUCTURER) {
            logger = getLogger(log_type);
        } else {
            logger = getLogger(LOG_MODULE_TYPE.TOOL);
        }
        logger.addContext('module', log_type);
        logger.addContext('tag', tag);
        return logger;
    }
}
