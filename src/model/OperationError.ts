export class OperationError extends Error {
  operation: string;
  sheetName: string;

  constructor(operation: string, sheetName: string, message: string) {
    super(message);
    this.name = 'OperationError';
    this.operation = operation;
    this.sheetName = sheetName;
  }
}
