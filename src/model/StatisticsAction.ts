export class StatisticsAction {
  outputSheet?: string;

  constructor(outputSheet?: string) {
    this.outputSheet = outputSheet;
  }
}
