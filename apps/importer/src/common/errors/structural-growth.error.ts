/** Thrown by a sheet store that cannot take the requested row/column insertion */
export class StructuralGrowthError extends Error {
  constructor(
    readonly sheetName: string,
    readonly axis: 'rows' | 'columns',
    readonly requested: number,
    readonly limit: number,
  ) {
    super(
      `Cannot insert ${requested} ${axis} into sheet '${sheetName}': the sheet would exceed ${limit} ${axis}`,
    );
    this.name = 'StructuralGrowthError';
  }
}
