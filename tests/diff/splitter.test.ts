import { describe, it, expect } from 'vitest';
import {
  splitDiffSections,
  parseSection,
  extractFilePath,
  countChanges,
} from '../../src/diff/splitter.js';

const PY_SECTION = `diff --git a/src/app.py b/src/app.py
index 1111111..2222222 100644
--- a/src/app.py
+++ b/src/app.py
@@ -1,2 +1,3 @@
 import os
+import sys
 print(os.getcwd())
`;

const MD_SECTION = `diff --git a/README.md b/README.md
index 3333333..4444444 100644
--- a/README.md
+++ b/README.md
@@ -1 +1 @@
-# Old title
+# New title
`;

describe('splitDiffSections', () => {
  it('should split a diff into one section per file', () => {
    const sections = splitDiffSections(PY_SECTION + MD_SECTION);

    expect(sections).toEqual([PY_SECTION, MD_SECTION]);
  });

  it('should reproduce the input when sections are joined', () => {
    const diff = PY_SECTION + MD_SECTION + PY_SECTION;
    expect(splitDiffSections(diff).join('')).toBe(diff);
  });

  it('should return an empty array for empty input', () => {
    expect(splitDiffSections('')).toEqual([]);
  });

  it('should return the whole input when there is no boundary', () => {
    const text = '--- a/file\n+++ b/file\n@@ -1 +1 @@\n-a\n+b\n';
    expect(splitDiffSections(text)).toEqual([text]);
  });

  it('should keep text before the first boundary as its own section', () => {
    const preamble = 'From 1234 Mon Sep 17 00:00:00 2001\nSubject: fix\n\n';
    const sections = splitDiffSections(preamble + PY_SECTION);

    expect(sections).toEqual([preamble, PY_SECTION]);
  });

  it('should not split on the boundary text in the middle of a line', () => {
    const section = `diff --git a/run.sh b/run.sh
--- a/run.sh
+++ b/run.sh
@@ -1 +1 @@
+echo "diff --git a/x b/x"
`;
    expect(splitDiffSections(section)).toEqual([section]);
  });
});

describe('extractFilePath', () => {
  it('should read the b/ side of the header', () => {
    expect(extractFilePath('diff --git a/old/name.ts b/new/name.ts\n')).toBe('new/name.ts');
  });

  it('should fall back to the +++ marker', () => {
    expect(extractFilePath('--- a/lib/x.ts\n+++ b/lib/x.ts\n@@ -1 +1 @@\n')).toBe('lib/x.ts');
  });

  it('should return undefined when no path is present', () => {
    expect(extractFilePath('just some text\n+added\n')).toBeUndefined();
  });
});

describe('countChanges', () => {
  it('should ignore the file markers', () => {
    expect(countChanges(MD_SECTION)).toEqual({ additions: 1, deletions: 1 });
  });
});

describe('parseSection', () => {
  it('should parse a modified file', () => {
    const section = parseSection(PY_SECTION);

    expect(section).toEqual({
      rawText: PY_SECTION,
      filePath: 'src/app.py',
      changeKind: 'modify',
      additions: 1,
      deletions: 0,
    });
    expect(Object.isFrozen(section)).toBe(true);
  });

  it('should detect added files', () => {
    const text = `diff --git a/src/new.ts b/src/new.ts
new file mode 100644
index 0000000..5555555
--- /dev/null
+++ b/src/new.ts
@@ -0,0 +1,2 @@
+export const a = 1;
+export const b = 2;
`;
    const section = parseSection(text);

    expect(section.changeKind).toBe('add');
    expect(section.additions).toBe(2);
  });

  it('should detect deleted files', () => {
    const text = `diff --git a/src/old.ts b/src/old.ts
deleted file mode 100644
index 5555555..0000000
--- a/src/old.ts
+++ /dev/null
@@ -1 +0,0 @@
-export const a = 1;
`;
    const section = parseSection(text);

    expect(section.changeKind).toBe('delete');
    expect(section.filePath).toBe('src/old.ts');
    expect(section.deletions).toBe(1);
  });

  it('should detect renames', () => {
    const text = `diff --git a/old.ts b/new.ts
similarity index 90%
rename from old.ts
rename to new.ts
`;
    const section = parseSection(text);

    expect(section.changeKind).toBe('rename');
    expect(section.filePath).toBe('new.ts');
  });

  it('should mark sections without a header as unknown', () => {
    const section = parseSection('garbage text\n+added line\n');

    expect(section.filePath).toBeUndefined();
    expect(section.changeKind).toBe('unknown');
    expect(section.additions).toBe(1);
  });
});
