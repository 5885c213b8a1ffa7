import type { Operation } from './Operation';

export class TransformAction {
  operations: Operation[];

  constructor(operations: Operation[] = []) {
    this.operations = operations;
  }
}
