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

// Chain links. A node is referred to by exactly one owner: either the
// previous node's `next`, or the list's `head`.

export class ChainNode<T> {
    data: T;
    next: ChainNode<T> | null = null;

    constructor(data: T) {
        this.data = data;
    }
}

export type Link<T> = ChainNode<T> | null;

export function nonEmpty<T>(n: Link<T>): n is ChainNode<T> {
    return n !== null;
}

// Follows `next` `steps` times. Returns null when the chain runs out first.
export function advance<T>(n: Link<T>, steps: number): Link<T> {
    while (steps-- > 0 && nonEmpty(n)) n = n.next;
    return n;
}

// Finds the node whose `next` is `target`, starting at `from`. With a null
// target this is the last node of the chain.
export function predecessor<T>(from: Link<T>, target: Link<T>): Link<T> {
    for (let n = from; nonEmpty(n); n = n.next) {
        if (n.next === target) return n;
    }
    return null;
}

export function contains<T>(from: Link<T>, target: ChainNode<T>): boolean {
    for (let n = from; nonEmpty(n); n = n.next) {
        if (n === target) return true;
    }
    return false;
}
