import type { ConversionType } from './Operation';

export interface SheetField {
  name: string;
  type: ConversionType;
}

export class SheetConf {
  name: string;
  fields: SheetField[];

  constructor(name: string, fields: SheetField[] = []) {
    this.name = name;
    this.fields = fields;
  }
}
