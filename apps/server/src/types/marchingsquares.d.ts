// marchingsquares ships no type declarations
declare module 'marchingsquares' {
  export interface IsoLinesOptions {
    linearRing?: boolean;
    noFrame?: boolean;
    noQuadTree?: boolean;
    polygons?: boolean;
    verbose?: boolean;
  }

  export function isoLines(data: number[][], threshold: number, options?: IsoLinesOptions): number[][][];
}
