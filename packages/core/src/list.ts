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

// Singly-linked sequence container.
//
// `head` owns the chain; `tail` is a back-reference to the last node, kept in
// step by every operation that touches the end of the chain. Cursors handed
// out by `begin()`/`end()` double as splice positions.

import { is } from 'immutable';

import { ChainNode, Link, nonEmpty, advance, predecessor, contains } from './node.js';
import { Cursor, ConstCursor, ForwardCursor, Position, nodeOf } from './cursor.js';
import {
    EmptyContainerError,
    IndexOutOfRangeError,
    InvalidOperationError,
    PositionNotFoundError,
} from './errors.js';
import { FixedArray, toFixedArray } from './fixed.js';
import { DoublyLinkedList } from './dlist.js';

export type Equality<T> = (a: T, b: T) => boolean;

// What a FIFO adapter needs from its backing store.
export interface BackInsertionSequence<T> {
    pushBack(value: T): void;
    popFront(): T;
    front(): T;
    back(): T;
    size(): number;
    empty(): boolean;
}

export class SinglyLinkedList<T> implements BackInsertionSequence<T>, Iterable<T> {
    private head: Link<T> = null;
    private tail: Link<T> = null;
    private _size = 0;

    constructor(items?: Iterable<T>) {
        if (items) this.append(items);
    }

    static from<T>(items: Iterable<T>): SinglyLinkedList<T> {
        return new SinglyLinkedList(items);
    }

    static of<T>(...items: T[]): SinglyLinkedList<T> {
        return new SinglyLinkedList(items);
    }

    // Copies [first, last). `last` must be reachable from `first`.
    static fromRange<T>(first: ForwardCursor<T>, last: ForwardCursor<T>): SinglyLinkedList<T> {
        const stop = nodeOf(last);
        const result = new SinglyLinkedList<T>();
        let n = nodeOf(first);
        while (n !== stop) {
            if (!nonEmpty(n)) throw new PositionNotFoundError("end of range not reachable from its start");
            result.pushBack(n.data);
            n = n.next;
        }
        return result;
    }

    // Transfers the chain out of `source`, leaving it empty.
    static take<T>(source: SinglyLinkedList<T>): SinglyLinkedList<T> {
        const result = new SinglyLinkedList<T>();
        result.moveFrom(source);
        return result;
    }

    //---------------------------------------------------------------------------
    // Mutation

    pushBack(value: T) {
        const node = new ChainNode(value);
        if (this.tail === null) {
            this.head = node;
        } else {
            this.tail.next = node;
        }
        this.tail = node;
        this._size++;
    }

    pushFront(value: T) {
        const node = new ChainNode(value);
        node.next = this.head;
        this.head = node;
        if (this.tail === null) this.tail = node;
        this._size++;
    }

    popFront(): T {
        const first = this.head;
        if (!nonEmpty(first)) throw new EmptyContainerError("pop from empty list");
        this.head = first.next;
        if (this.head === null) this.tail = null;
        first.next = null;
        this._size--;
        return first.data;
    }

    popBack(): T {
        const last = this.tail;
        if (!nonEmpty(last)) throw new EmptyContainerError("pop from empty list");
        if (this.head === last) {
            this.head = this.tail = null;
        } else {
            const before = predecessor(this.head, last);
            if (!nonEmpty(before)) throw new Error("INVARIANT VIOLATED: tail not reachable from head");
            before.next = null;
            this.tail = before;
        }
        this._size--;
        return last.data;
    }

    // Splices `value` in immediately before `position`. The end position
    // appends. Returns a cursor at the new element.
    insertBefore(position: Position<T>, value: T): Cursor<T> {
        const target = nodeOf(position);
        if (target === this.head) {
            this.pushFront(value);
            return this.begin();
        }
        const before = predecessor(this.head, target);
        if (!nonEmpty(before)) throw new PositionNotFoundError();

        const node = new ChainNode(value);
        node.next = target;
        before.next = node;
        if (node.next === null) this.tail = node;
        this._size++;
        return new Cursor(node);
    }

    // Unlinks the element immediately before `position` and returns it. At
    // the end position this removes the last element.
    eraseBefore(position: Position<T>): T {
        const target = nodeOf(position);
        if (this.head === null || target === this.head) {
            throw new InvalidOperationError("cannot erase before the first element");
        }
        if (this.head.next === target) return this.popFront();

        let before: ChainNode<T> = this.head;
        let victim: Link<T> = before.next;
        while (nonEmpty(victim) && victim.next !== target) {
            before = victim;
            victim = victim.next;
        }
        if (!nonEmpty(victim)) throw new PositionNotFoundError();

        before.next = victim.next;
        if (before.next === null) this.tail = before;
        victim.next = null;
        this._size--;
        return victim.data;
    }

    clear() {
        this.head = this.tail = null;
        this._size = 0;
    }

    // Replaces the contents with the elements of `items`, in order.
    // The source is read in full before the chain is cleared, so it may be
    // this list or a lazy view of it.
    assign(items: Iterable<T>): this {
        const snapshot = Array.from(items);
        this.clear();
        this.append(snapshot);
        return this;
    }

    // Takes over the chain of `source`. Cursors issued by `source` now walk
    // this list's chain.
    moveFrom(source: SinglyLinkedList<T>): this {
        if (source === this) return this;
        this.head = source.head;
        this.tail = source.tail;
        this._size = source._size;
        source.head = source.tail = null;
        source._size = 0;
        return this;
    }

    swap(other: SinglyLinkedList<T>) {
        [this.head, other.head] = [other.head, this.head];
        [this.tail, other.tail] = [other.tail, this.tail];
        [this._size, other._size] = [other._size, this._size];
    }

    //---------------------------------------------------------------------------
    // Access

    front(): T {
        if (!nonEmpty(this.head)) throw new EmptyContainerError("front of empty list");
        return this.head.data;
    }

    back(): T {
        if (!nonEmpty(this.tail)) throw new EmptyContainerError("back of empty list");
        return this.tail.data;
    }

    getHead(): T {
        return this.front();
    }

    getTail(): T {
        return this.back();
    }

    get(index: number): T {
        if (!Number.isInteger(index) || index < 0 || index >= this._size) {
            throw new IndexOutOfRangeError(index, this._size);
        }
        const n = advance(this.head, index);
        if (!nonEmpty(n)) throw new Error("INVARIANT VIOLATED: chain shorter than recorded size");
        return n.data;
    }

    size(): number {
        return this._size;
    }

    empty(): boolean {
        return this._size === 0;
    }

    equals(other: SinglyLinkedList<T>, eq: Equality<T> = is): boolean {
        if (other === this) return true;
        if (other._size !== this._size) return false;
        let a = this.head;
        let b = other.head;
        while (nonEmpty(a) && nonEmpty(b)) {
            if (!eq(a.data, b.data)) return false;
            a = a.next;
            b = b.next;
        }
        return a === b;
    }

    // Element-wise copy into a fresh chain.
    clone(): SinglyLinkedList<T> {
        return new SinglyLinkedList(this);
    }

    //---------------------------------------------------------------------------
    // Conversion

    toArray(): Array<T> {
        const result: Array<T> = [];
        for (let n = this.head; nonEmpty(n); n = n.next) result.push(n.data);
        return result;
    }

    toDoublyLinkedList(): DoublyLinkedList<T> {
        return new DoublyLinkedList(this);
    }

    toArrayPad(n: number, fill: () => T): FixedArray<T> {
        return toFixedArray(this, n, 'pad', fill);
    }

    toArrayCut(n: number): FixedArray<T> {
        return toFixedArray(this, n, 'cut');
    }

    toArrayAuto(n: number, fill: () => T): FixedArray<T> {
        return toFixedArray(this, n, 'auto', fill);
    }

    toString(): string {
        return `SinglyLinkedList[${this.toArray().map(String).join(', ')}]`;
    }

    //---------------------------------------------------------------------------
    // Traversal

    begin(): Cursor<T> {
        return new Cursor(this.head);
    }

    end(): Cursor<T> {
        return new Cursor<T>(null);
    }

    cbegin(): ConstCursor<T> {
        return new ConstCursor(this.head);
    }

    cend(): ConstCursor<T> {
        return new ConstCursor<T>(null);
    }

    *values(): IterableIterator<T> {
        for (let n = this.head; nonEmpty(n); n = n.next) yield n.data;
    }

    [Symbol.iterator](): IterableIterator<T> {
        return this.values();
    }

    has(position: Position<T>): boolean {
        const target = nodeOf(position);
        return target === null || contains(this.head, target);
    }

    // Walks the whole chain and checks head, tail and size against it.
    checkInvariants() {
        if ((this.head === null) !== (this.tail === null)) {
            throw new Error("INVARIANT VIOLATED: head and tail disagree about emptiness");
        }
        let count = 0;
        let last: Link<T> = null;
        for (let n = this.head; nonEmpty(n); n = n.next) {
            if (count > this._size) {
                throw new Error("INVARIANT VIOLATED: chain longer than recorded size");
            }
            count++;
            last = n;
        }
        if (count !== this._size) {
            throw new Error(`INVARIANT VIOLATED: recorded size ${this._size}, chain has ${count}`);
        }
        if (last !== this.tail) {
            throw new Error("INVARIANT VIOLATED: tail is not the last node of the chain");
        }
    }

    private append(items: Iterable<T>) {
        for (const item of items) this.pushBack(item);
    }
}
