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

// A doubly-linked ring with a sentinel. The list object itself is the
// sentinel: an empty list links to itself on both sides, and a walk in either
// direction stops when it comes back round to the list.

import { EmptyContainerError } from './errors.js';

export interface RingLink<T> {
    prev: RingLink<T>;
    next: RingLink<T>;
}

class RingEntry<T> implements RingLink<T> {
    prev: RingLink<T>;
    next: RingLink<T>;
    readonly value: T;

    constructor(value: T, prev: RingLink<T>, next: RingLink<T>) {
        this.value = value;
        this.prev = prev;
        this.next = next;
    }
}

export class DoublyLinkedList<T> implements RingLink<T>, Iterable<T> {
    prev: RingLink<T>;
    next: RingLink<T>;
    private _size = 0;

    constructor(items?: Iterable<T>) {
        this.prev = this.next = this;
        if (items) for (const item of items) this.pushBack(item);
    }

    size(): number {
        return this._size;
    }

    empty(): boolean {
        return this._size === 0;
    }

    pushBack(value: T) {
        this.insertBetween(this.prev, value, this);
    }

    pushFront(value: T) {
        this.insertBetween(this, value, this.next);
    }

    popFront(): T {
        return this.unlink(this.entryAt(this.next, "pop from empty list"));
    }

    popBack(): T {
        return this.unlink(this.entryAt(this.prev, "pop from empty list"));
    }

    front(): T {
        return this.entryAt(this.next, "front of empty list").value;
    }

    back(): T {
        return this.entryAt(this.prev, "back of empty list").value;
    }

    clear() {
        this.prev = this.next = this;
        this._size = 0;
    }

    toArray(): Array<T> {
        return Array.from(this);
    }

    *[Symbol.iterator](): IterableIterator<T> {
        for (let link = this.next; link !== this; link = link.next) {
            if (link instanceof RingEntry) yield link.value;
        }
    }

    *reversed(): IterableIterator<T> {
        for (let link = this.prev; link !== this; link = link.prev) {
            if (link instanceof RingEntry) yield link.value;
        }
    }

    private insertBetween(prev: RingLink<T>, value: T, next: RingLink<T>) {
        const entry = new RingEntry(value, prev, next);
        prev.next = entry;
        next.prev = entry;
        this._size++;
    }

    private entryAt(link: RingLink<T>, what: string): RingEntry<T> {
        if (link instanceof RingEntry) return link;
        throw new EmptyContainerError(what);
    }

    // Splices the neighbours of `entry` together and leaves `entry` pointing
    // at itself.
    private unlink(entry: RingEntry<T>): T {
        entry.prev.next = entry.next;
        entry.next.prev = entry.prev;
        entry.prev = entry.next = entry;
        this._size--;
        return entry.value;
    }
}
