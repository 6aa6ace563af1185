const DEPENDENCY_GRAPH_DOCS =
  'https://docs.github.com/en/github/visualizing-repository-data-with-graphs/about-the-dependency-graph#supported-package-ecosystems';

export interface HeaderInfo {
  /** Repository-relative path of the script that generated the file. */
  generatorPath: string;
  /** Repository-relative path of the manifest the pins were resolved from. */
  manifestPath: string;
}

export function renderHeader({ generatorPath, manifestPath }: HeaderInfo): string {
  return [
    `# This file was generated by ${generatorPath} and can be updated using`,
    `# that script. Dependencies are resolved from ${manifestPath}.`,
    '#',
    '# It is normally used as constraints to pip, however, it has the name',
    '# requirements.txt so that is scanned by GitHub. See',
    `# ${DEPENDENCY_GRAPH_DOCS}`,
    '# for more info.',
    '',
  ].join('\n');
}
