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

// FIFO adapter. Elements go in at the back of the backing container and
// come out at its front.

import { BackInsertionSequence, SinglyLinkedList } from './list.js';

export class Queue<T, C extends BackInsertionSequence<T> = SinglyLinkedList<T>> {
    readonly container: C;

    constructor(container: C) {
        this.container = container;
    }

    static create<T>(items?: Iterable<T>): Queue<T> {
        return new Queue<T>(new SinglyLinkedList(items));
    }

    push(value: T) {
        this.container.pushBack(value);
    }

    pop(): T {
        return this.container.popFront();
    }

    front(): T {
        return this.container.front();
    }

    back(): T {
        return this.container.back();
    }

    size(): number {
        return this.container.size();
    }

    empty(): boolean {
        return this.container.empty();
    }
}
