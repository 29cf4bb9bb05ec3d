import { describe, it, expect } from 'vitest';
import {
  analyzeCodePatterns,
  extractAddedText,
  getExtensionScore,
  loadImportanceTable,
  scoreSection,
  scoreSections,
  volumeFactor,
  NO_PATTERN_PENALTY,
} from '../../src/diff/scorer.js';
import { parseSection } from '../../src/diff/splitter.js';

const MODIFIED_PY = `diff --git a/src/app.py b/src/app.py
index 1111111..2222222 100644
--- a/src/app.py
+++ b/src/app.py
@@ -1,2 +1,3 @@
 import os
+import sys
 print(os.getcwd())
`;

function tsSection(header: string): string {
  return `diff --git a/src/x.ts b/src/x.ts
${header}
--- a/src/x.ts
+++ b/src/x.ts
@@ -0,0 +1 @@
+const total = 1;
`;
}

describe('getExtensionScore', () => {
  it('should load the bundled importance table', () => {
    const table = loadImportanceTable();
    expect(table.extensions['.py']).toBe(5.0);
    expect(loadImportanceTable()).toBe(table);
  });

  it('should score by extension', () => {
    expect(getExtensionScore('src/app.py')).toBe(5.0);
    expect(getExtensionScore('src/App.TSX')).toBe(4.8);
    expect(getExtensionScore('notes.txt')).toBe(2.5);
  });

  it('should match special file names before extensions', () => {
    expect(getExtensionScore('Dockerfile')).toBe(4.0);
    expect(getExtensionScore('deploy/Dockerfile.prod')).toBe(4.0);
    expect(getExtensionScore('README.md')).toBe(4.0);
    expect(getExtensionScore('frontend/package.json')).toBe(4.2);
  });

  it('should treat dotfiles as extensions', () => {
    expect(getExtensionScore('.env')).toBe(3.5);
  });

  it('should default to 1.0 for unknown files', () => {
    expect(getExtensionScore('notes.xyz')).toBe(1.0);
    expect(getExtensionScore('LICENSE')).toBe(1.0);
  });

  it('should accept a custom table', () => {
    const table = { filenames: {}, extensions: { '.ts': 9 } };
    expect(getExtensionScore('src/a.ts', table)).toBe(9);
  });
});

describe('analyzeCodePatterns', () => {
  it('should apply the penalty when nothing matches', () => {
    expect(analyzeCodePatterns('plain words here')).toBe(NO_PATTERN_PENALTY);
  });

  it('should reward type definitions', () => {
    expect(analyzeCodePatterns('class Foo:')).toBeCloseTo(1.8);
  });

  it('should compound multiple matches', () => {
    expect(analyzeCodePatterns('def add(a, b):\n    return a + b')).toBeCloseTo(1.65);
  });
});

describe('extractAddedText', () => {
  it('should return added lines without the prefix', () => {
    expect(extractAddedText(MODIFIED_PY)).toBe('import sys');
  });
});

describe('volumeFactor', () => {
  it('should grow with the number of changes and cap at 2', () => {
    expect(volumeFactor(0)).toBe(1.0);
    expect(volumeFactor(5)).toBeCloseTo(1.1);
    expect(volumeFactor(100)).toBe(2.0);
  });
});

describe('scoreSection', () => {
  it('should combine extension, volume and patterns', () => {
    // 5.0 (.py) x 1.02 (one change) x 1.3 (import)
    expect(scoreSection(parseSection(MODIFIED_PY))).toBeCloseTo(6.63);
  });

  it('should favour new files over modifications', () => {
    const added = scoreSection(parseSection(tsSection('new file mode 100644')));
    const modified = scoreSection(parseSection(tsSection('index 1111111..2222222 100644')));

    expect(added / modified).toBeCloseTo(1.2);
  });

  it('should favour deletions over modifications', () => {
    const deleted = scoreSection(parseSection(tsSection('deleted file mode 100644')));
    const modified = scoreSection(parseSection(tsSection('index 1111111..2222222 100644')));

    expect(deleted / modified).toBeCloseTo(1.1);
  });

  it('should score sections without a path', () => {
    // 1.02 (one change) x 0.9 (no pattern)
    expect(scoreSection(parseSection('random text\n+plain words\n'))).toBeCloseTo(0.918);
  });

  it('should be deterministic', () => {
    const section = parseSection(MODIFIED_PY);
    expect(scoreSection(section)).toBe(scoreSection(section));
  });
});

describe('scoreSections', () => {
  it('should keep input order', () => {
    const py = parseSection(MODIFIED_PY);
    const ts = parseSection(tsSection('new file mode 100644'));

    const scored = scoreSections([ts, py]);

    expect(scored.map((s) => s.section)).toEqual([ts, py]);
    expect(scored[1]?.score).toBeCloseTo(6.63);
  });
});
