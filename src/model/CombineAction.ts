export type CombineMethod = 'concat' | 'merge';
export type MergeHow = 'inner' | 'left';

export class CombineAction {
  method: CombineMethod;
  sheets: string[];
  on?: string;
  how: MergeHow;

  constructor(method: CombineMethod, sheets: string[], on?: string, how: MergeHow = 'inner') {
    this.method = method;
    this.sheets = sheets;
    this.on = on;
    this.how = how;
  }
}
