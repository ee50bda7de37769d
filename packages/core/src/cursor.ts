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

// Forward cursors over a chain of nodes. A cursor holding no node is the
// one-past-the-end position. Cursors do not own nodes and are not told about
// mutation: splicing at or before a cursor's node leaves it pointing at
// whatever that node is linked to now.
//
// The node a cursor holds is kept under `NODE`, which the package entry point
// does not export: outside this package a cursor is an opaque position.

import { ChainNode, Link } from './node.js';
import { InvalidOperationError } from './errors.js';

export const NODE = Symbol('node');

export abstract class ForwardCursor<T> implements IterableIterator<T> {
    [NODE]: Link<T>;

    constructor(node: Link<T>) {
        this[NODE] = node;
    }

    atEnd(): boolean {
        return this[NODE] === null;
    }

    protected deref(): ChainNode<T> {
        const node = this[NODE];
        if (node === null) {
            throw new InvalidOperationError("cannot dereference the end cursor");
        }
        return node;
    }

    increment(): this {
        this[NODE] = this.deref().next;
        return this;
    }

    equals(other: ForwardCursor<T>): boolean {
        return this[NODE] === other[NODE];
    }

    next(): IteratorResult<T> {
        const node = this[NODE];
        if (node === null) {
            return { done: true, value: void 0 };
        }
        this[NODE] = node.next;
        return { done: false, value: node.data };
    }

    [Symbol.iterator](): this {
        return this;
    }
}

export class Cursor<T> extends ForwardCursor<T> {
    get value(): T {
        return this.deref().data;
    }

    set value(v: T) {
        this.deref().data = v;
    }

    clone(): Cursor<T> {
        return new Cursor(this[NODE]);
    }

    postIncrement(): Cursor<T> {
        const previous = this.clone();
        this.increment();
        return previous;
    }

    toConst(): ConstCursor<T> {
        return new ConstCursor(this[NODE]);
    }
}

export class ConstCursor<T> extends ForwardCursor<T> {
    get value(): T {
        return this.deref().data;
    }

    clone(): ConstCursor<T> {
        return new ConstCursor(this[NODE]);
    }

    postIncrement(): ConstCursor<T> {
        const previous = this.clone();
        this.increment();
        return previous;
    }
}

// Anything a list hands out can anchor a splice.
export type Position<T> = ForwardCursor<T>;

export function nodeOf<T>(position: Position<T>): Link<T> {
    return position[NODE];
}
