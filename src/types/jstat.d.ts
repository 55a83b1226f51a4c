// Basic type declarations for jstat

declare module 'jstat' {
  export interface jStat {
    gammaln(x: number): number;
    mean(data: number[]): number;
    variance(data: number[], sample?: boolean): number;
  }

  const jStat: jStat;
  export default jStat;
}
