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

// Conversions between SinglyLinkedList and the other ordered containers.

import { List as ImmutableList } from 'immutable';

import { SinglyLinkedList } from './list.js';
import { DoublyLinkedList } from './dlist.js';
import { FixedArray, FixedPolicy, toFixedArray } from './fixed.js';

export function fromArray<T>(items: ReadonlyArray<T>): SinglyLinkedList<T> {
    return new SinglyLinkedList(items);
}

export function fromFixedArray<T>(items: FixedArray<T>): SinglyLinkedList<T> {
    return new SinglyLinkedList(items);
}

export function fromDoublyLinkedList<T>(items: DoublyLinkedList<T>): SinglyLinkedList<T> {
    return new SinglyLinkedList(items);
}

export function fromImmutable<T>(items: ImmutableList<T>): SinglyLinkedList<T> {
    return new SinglyLinkedList(items);
}

export function toArray<T>(list: SinglyLinkedList<T>): Array<T> {
    return list.toArray();
}

export function toFixed<T>(list: SinglyLinkedList<T>,
                           n: number,
                           policy: FixedPolicy,
                           fill?: () => T): FixedArray<T>
{
    return toFixedArray(list, n, policy, fill);
}

export function toDoublyLinkedList<T>(list: SinglyLinkedList<T>): DoublyLinkedList<T> {
    return list.toDoublyLinkedList();
}

export function toImmutable<T>(list: SinglyLinkedList<T>): ImmutableList<T> {
    return ImmutableList(list);
}
