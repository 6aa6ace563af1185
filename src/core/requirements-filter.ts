export interface LocalPackageFilter {
  /** Exclusion patterns; matched against PEP 503 normalized names. */
  exclude: string[];
  /** Drop `name @ <local path>` references and `-e` lines as well. */
  stripPathDependencies: boolean;
}

export interface FilterResult {
  content: string;
  /** Requirement lines that survived. */
  kept: number;
  /** Package names (or editable targets) that were dropped, in file order. */
  removed: string[];
}

const NAME_RE = /^([A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?)/;
const DIRECT_REF_RE = /^[A-Za-z0-9][A-Za-z0-9._-]*(?:\[[^\]]*\])?\s*@\s*(\S+)/;
const EDITABLE_RE = /^(?:-e|--editable)(?:\s+|=)(\S+)/;
const LOCAL_TARGET_RE = /^(?:file:|\/|\.\.?\/|[A-Za-z]:[\\/])/;

export function normalizePackageName(name: string): string {
  return name.toLowerCase().replace(/[-_.]+/g, '-');
}

function patternToRegExp(pattern: string): RegExp {
  const body = normalizePackageName(pattern)
    .split('*')
    .map((part) => part.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');
  return new RegExp(`^${body}$`);
}

export function matchesExclusion(name: string, patterns: string[]): boolean {
  const normalized = normalizePackageName(name);
  return patterns.some((pattern) => patternToRegExp(pattern).test(normalized));
}

type LineKind =
  | { kind: 'passthrough' }
  | { kind: 'requirement'; name: string; localTarget: string | null }
  | { kind: 'editable'; target: string; name: string | null };

function classify(line: string): LineKind {
  const trimmed = line.trim();
  if (trimmed === '' || trimmed.startsWith('#')) return { kind: 'passthrough' };

  const editable = EDITABLE_RE.exec(trimmed);
  if (editable) {
    const target = editable[1];
    const egg = /#egg=([A-Za-z0-9._-]+)/.exec(target);
    return { kind: 'editable', target, name: egg ? egg[1] : null };
  }

  if (trimmed.startsWith('-')) return { kind: 'passthrough' };

  const name = NAME_RE.exec(trimmed);
  if (!name) return { kind: 'passthrough' };

  const ref = DIRECT_REF_RE.exec(trimmed);
  const localTarget = ref && LOCAL_TARGET_RE.test(ref[1]) ? ref[1] : null;
  return { kind: 'requirement', name: name[1], localTarget };
}

/**
 * Remove locally developed packages from exported requirement lines.
 * Surviving lines are returned verbatim and in their original order.
 */
export function filterLocalPackages(
  content: string,
  filter: LocalPackageFilter,
): FilterResult {
  const lines = content.split('\n');
  const out: string[] = [];
  const removed: string[] = [];
  let kept = 0;

  for (const line of lines) {
    const entry = classify(line);

    switch (entry.kind) {
      case 'passthrough':
        out.push(line);
        break;
      case 'editable': {
        const excluded =
          filter.stripPathDependencies ||
          (entry.name !== null && matchesExclusion(entry.name, filter.exclude));
        if (excluded) {
          removed.push(entry.name ?? entry.target);
        } else {
          out.push(line);
          kept++;
        }
        break;
      }
      case 'requirement': {
        const excluded =
          matchesExclusion(entry.name, filter.exclude) ||
          (filter.stripPathDependencies && entry.localTarget !== null);
        if (excluded) {
          removed.push(entry.name);
        } else {
          out.push(line);
          kept++;
        }
        break;
      }
    }
  }

  return { content: out.join('\n'), kept, removed };
}
