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

export enum ErrorKind {
    EmptyContainer = 'EmptyContainer',
    IndexOutOfRange = 'IndexOutOfRange',
    PositionNotFound = 'PositionNotFound',
    InvalidOperation = 'InvalidOperation',
    InvalidArgument = 'InvalidArgument',
    Overflow = 'Overflow',
    Underflow = 'Underflow',
}

export abstract class ListError extends Error {
    abstract readonly kind: ErrorKind;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class EmptyContainerError extends ListError {
    readonly kind = ErrorKind.EmptyContainer;
}

export class IndexOutOfRangeError extends ListError {
    readonly kind = ErrorKind.IndexOutOfRange;
    readonly index: number;
    readonly size: number;

    constructor(index: number, size: number) {
        super(`index ${index} out of range for list of size ${size}`);
        this.index = index;
        this.size = size;
    }
}

export class PositionNotFoundError extends ListError {
    readonly kind = ErrorKind.PositionNotFound;

    constructor(message: string = "position not found in this list") {
        super(message);
    }
}

export class InvalidOperationError extends ListError {
    readonly kind = ErrorKind.InvalidOperation;
}

export class InvalidArgumentError extends ListError {
    readonly kind = ErrorKind.InvalidArgument;
}

export class OverflowError extends ListError {
    readonly kind = ErrorKind.Overflow;
}

export class UnderflowError extends ListError {
    readonly kind = ErrorKind.Underflow;
}

export function isListError(e: unknown, kind?: ErrorKind): e is ListError {
    return e instanceof ListError && (kind === void 0 || e.kind === kind);
}
