import { describe, it, expect } from 'vitest';
import {
  classifySection,
  shouldExcludeSection,
  isLockfileOrGenerated,
  isMinifiedContent,
  summarizeExcludedSection,
} from '../../src/diff/filter.js';

function section(path: string, body = '+const value = 1;'): string {
  return `diff --git a/${path} b/${path}
index 1111111..2222222 100644
--- a/${path}
+++ b/${path}
@@ -1 +1 @@
${body}
`;
}

describe('classifySection', () => {
  it('should keep ordinary source files', () => {
    expect(classifySection(section('src/app.ts'))).toBeUndefined();
    expect(shouldExcludeSection(section('src/app.ts'))).toBe(false);
  });

  it('should exclude binary changes', () => {
    const text =
      'diff --git a/img/logo.png b/img/logo.png\nBinary files a/img/logo.png and b/img/logo.png differ\n';
    expect(classifySection(text)).toBe('binary');
  });

  it('should exclude binary patches', () => {
    const text = 'diff --git a/font.woff b/font.woff\nGIT binary patch\nliteral 1024\n';
    expect(classifySection(text)).toBe('binary');
  });

  it('should exclude minified assets by extension', () => {
    expect(classifySection(section('static/app.min.js'))).toBe('minified-extension');
    expect(classifySection(section('styles/site.bundle.css'))).toBe('minified-extension');
  });

  it('should exclude build output directories', () => {
    expect(classifySection(section('web/dist/app.js'))).toBe('build-directory');
    expect(classifySection(section('lib/node_modules/pkg/index.js'))).toBe('build-directory');
  });

  it('should keep files in top-level directories named like build output', () => {
    expect(classifySection(section('dist/app.js'))).toBeUndefined();
    expect(classifySection(section('build/webpack.config.ts'))).toBeUndefined();
  });

  it('should exclude lockfiles', () => {
    expect(classifySection(section('package-lock.json'))).toBe('lockfile');
    expect(classifySection(section('frontend/yarn.lock'))).toBe('lockfile');
    expect(classifySection(section('go.sum'))).toBe('lockfile');
  });

  it('should exclude generated files', () => {
    expect(classifySection(section('api/service.pb.go'))).toBe('generated');
    expect(classifySection(section('src/generated.ts'))).toBe('generated');
  });

  it('should exclude custom glob patterns', () => {
    const options = { excludePatterns: ['docs/**'] };
    expect(classifySection(section('docs/guide/intro.md'), options)).toBe('custom-pattern');
    expect(classifySection(section('src/intro.md'), options)).toBeUndefined();
  });

  it('should match slash-free patterns against the file name', () => {
    expect(classifySection(section('fixtures/data/sample.snap'), { excludePatterns: ['*.snap'] })).toBe(
      'custom-pattern'
    );
  });

  it('should exclude minified content in source files', () => {
    const text = section('src/app.js', `+${'x'.repeat(350)}`);
    expect(classifySection(text)).toBe('minified-content');
  });

  it('should prefer the earliest matching reason', () => {
    expect(classifySection(section('dist/app.min.js'))).toBe('minified-extension');
  });

  it('should only check for binary content when there is no path', () => {
    const longLine = `+${'y'.repeat(400)}\n`;
    expect(classifySection(`some text\n${longLine}`)).toBeUndefined();
    expect(classifySection('some text\nBinary files x and y differ\n')).toBe('binary');
  });
});

describe('isLockfileOrGenerated', () => {
  it('should recognise lockfiles and generated files', () => {
    expect(isLockfileOrGenerated('Cargo.lock')).toBe(true);
    expect(isLockfileOrGenerated('lib/models.g.dart')).toBe(true);
    expect(isLockfileOrGenerated('src/main.rs')).toBe(false);
  });
});

describe('isMinifiedContent', () => {
  it('should return false for empty content', () => {
    expect(isMinifiedContent('')).toBe(false);
  });

  it('should return false for normal code', () => {
    const content = Array.from({ length: 12 }, (_, i) => `const value${i} = ${i};`).join('\n');
    expect(isMinifiedContent(content)).toBe(false);
  });

  it('should flag a single long line', () => {
    expect(isMinifiedContent('a'.repeat(250))).toBe(true);
  });

  it('should flag few lines with a lot of content', () => {
    const content = Array.from({ length: 5 }, () => 'word '.repeat(50)).join('\n');
    expect(isMinifiedContent(content)).toBe(true);
  });

  it('should flag a long line with almost no spaces', () => {
    const lines = Array.from({ length: 12 }, () => 'short line');
    lines.push('z'.repeat(320));
    expect(isMinifiedContent(lines.join('\n'))).toBe(true);
  });

  it('should flag content that is mostly very long lines', () => {
    const longLine = 'ab '.repeat(200);
    const lines = [longLine, longLine, longLine, ...Array.from({ length: 7 }, () => 'short')];
    expect(isMinifiedContent(lines.join('\n'))).toBe(true);
  });
});

describe('summarizeExcludedSection', () => {
  it('should keep the header lines and add a label', () => {
    const text = `diff --git a/package-lock.json b/package-lock.json
index 123abc..456def 100644
--- a/package-lock.json
+++ b/package-lock.json
@@ -1,3 +1,3 @@
-  "version": "1.0.0"
+  "version": "1.0.1"
`;
    expect(summarizeExcludedSection(text, 'lockfile')).toBe(
      'diff --git a/package-lock.json b/package-lock.json\nindex 123abc..456def 100644\n[Lockfile/generated file change]\n'
    );
  });

  it('should keep new file markers for binary files', () => {
    const text = `diff --git a/logo.png b/logo.png
new file mode 100644
index 0000000..abc1234
Binary files /dev/null and b/logo.png differ
`;
    expect(summarizeExcludedSection(text, 'binary')).toBe(
      'diff --git a/logo.png b/logo.png\nnew file mode 100644\nindex 0000000..abc1234\n[Binary file change]\n'
    );
  });
});
