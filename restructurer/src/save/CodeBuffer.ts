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
 * Text assembled line by line. Every line is indented by `unit` once per open nesting level.
 */
export class CodeBuffer {
    private lines: string[] = [];
    private depth: number = 0;
    private unit: string;

    constructor(unit: string = '  ') {
        this.unit = unit;
    }

    public writeLine(text: string): this {
        this.lines.push(this.unit.repeat(this.depth) + text);
        return this;
    }

    public incIndent(): this {
        this.depth++;
        return this;
    }

    public decIndent(): this {
        if (this.depth > 0) {
            this.depth--;
        }
        return this;
    }

    public toString(): string {
        return this.lines.map((line) => `${line}\n`).join('');
    }

    public clear(): void {
        this.lines = [];
        this.depth = 0;
    }
}
