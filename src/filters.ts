import { minimatch } from "minimatch"

function matchesAny(path: string, patterns: string[]): boolean {
  return patterns.some((pattern) => minimatch(path, pattern, { dot: true, nocase: true }))
}

export function sampleKey(source: string, family: string, name: string): string {
  return `${source}/${family}/${name}`
}

/** Include/exclude globs over `source/family/metric`. Exclusion wins. */
export class SampleFilter {
  constructor(
    private readonly include: string[] = [],
    private readonly exclude: string[] = [],
  ) {}

  get isEmpty(): boolean {
    return this.include.length === 0 && this.exclude.length === 0
  }

  allows(source: string, family: string, name: string): boolean {
    if (this.isEmpty) {
      return true
    }
    const key = sampleKey(source, family, name)
    if (this.exclude.length > 0 && matchesAny(key, this.exclude)) {
      return false
    }
    return this.include.length === 0 || matchesAny(key, this.include)
  }
}
