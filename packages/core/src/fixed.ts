//---------------------------------------------------------------------------
// @chainlist/core, a singly-linked sequence container for JS.
// Copyright (C) 2016-2021 Tony Garnock-Jones <tonyg@leastfixedpoint.com>
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU General Public License as published by
// the Free Software Foundation, either version 3 of the License, or
// (at your option) any later version.
//
// This program is distributed in the hope that it will be useful,
// but WITHOUT ANY WARRANTY; without even the implied warranty of
// MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE.  See the
// GNU General Public License for more details.
//
// You should have received a copy of the GNU General Public License
// along with this program.  If not, see <https://www.gnu.org/licenses/>.
//---------------------------------------------------------------------------

// Fixed-size arrays: plain arrays sealed at a given length. Slots stay
// writable; the length cannot change.

import {
    InvalidArgumentError,
    OverflowError,
    UnderflowError,
    InvalidOperationError,
} from './errors.js';

export type FixedArray<T> = T[];

// pad:  fails when the source is longer than the target, pads when shorter.
// cut:  fails when the source is shorter than the target, truncates when longer.
// auto: pads or truncates, never fails on length.
export type FixedPolicy = 'pad' | 'cut' | 'auto';

export function checkLength(n: number) {
    if (!Number.isInteger(n) || n < 1) {
        throw new InvalidArgumentError(`array size must be a positive integer, got ${n}`);
    }
}

export function fixedArrayOf<T>(...items: T[]): FixedArray<T> {
    checkLength(items.length);
    return Object.seal(items);
}

// `fill` supplies each padded slot; padding without one is an error.
export function toFixedArray<T>(items: Iterable<T>,
                                n: number,
                                policy: FixedPolicy,
                                fill?: () => T): FixedArray<T>
{
    checkLength(n);
    const result: T[] = [];
    for (const item of items) {
        if (result.length >= n) {
            if (policy === 'pad') {
                throw new OverflowError(`list size exceeds array size ${n}`);
            }
            break;
        }
        result.push(item);
    }
    if (result.length < n) {
        if (policy === 'cut') {
            throw new UnderflowError(`array size ${n} exceeds list size ${result.length}`);
        }
        if (fill === void 0) {
            throw new InvalidOperationError(`no fill value given to pad to size ${n}`);
        }
        while (result.length < n) result.push(fill());
    }
    return Object.seal(result);
}
