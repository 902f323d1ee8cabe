import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { Diagnostics } from './diagnostics.js';
import { copyAssets, copyDependencies, writePage } from './materializer.js';

describe('materializer', () => {
  let tmp: string;
  let outputDir: string;

  beforeEach(() => {
    tmp = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'swatchbook-copy-')));
    outputDir = path.join(tmp, 'out');
    fs.ensureDirSync(outputDir);
  });

  afterEach(() => {
    fs.removeSync(tmp);
  });

  describe('writePage', () => {
    it('writes the page into the output directory', () => {
      writePage(outputDir, 'index.html', '<p>hi</p>');
      expect(fs.readFileSync(path.join(outputDir, 'index.html'), 'utf-8')).toBe('<p>hi</p>');
    });

    it('fails when the output directory is missing', () => {
      expect(() => writePage(path.join(tmp, 'missing'), 'index.html', '')).toThrow();
    });
  });

  describe('copyAssets', () => {
    beforeEach(() => {
      const assets = path.join(tmp, 'assets');
      fs.outputFileSync(path.join(assets, '_header.html'), 'header');
      fs.outputFileSync(path.join(assets, '_partials/nav.html'), 'nav');
      fs.outputFileSync(path.join(assets, 'style.css'), 'new');
      fs.outputFileSync(path.join(assets, 'img/logo.svg'), '<svg/>');

      fs.outputFileSync(path.join(outputDir, 'style.css'), 'old');
      fs.outputFileSync(path.join(outputDir, 'img/stale.svg'), 'stale');
    });

    it('skips underscored entries', () => {
      expect(copyAssets(path.join(tmp, 'assets'), outputDir).sort()).toEqual(['img', 'style.css']);
      expect(fs.existsSync(path.join(outputDir, '_header.html'))).toBe(false);
      expect(fs.existsSync(path.join(outputDir, '_partials'))).toBe(false);
    });

    it('replaces what was there before', () => {
      copyAssets(path.join(tmp, 'assets'), outputDir);
      expect(fs.readFileSync(path.join(outputDir, 'style.css'), 'utf-8')).toBe('new');
      expect(fs.readdirSync(path.join(outputDir, 'img'))).toEqual(['logo.svg']);
    });
  });

  describe('copyDependencies', () => {
    it('copies each directory under its base name', () => {
      fs.outputFileSync(path.join(tmp, 'build/bundle.js'), 'bundle');
      fs.outputFileSync(path.join(outputDir, 'build/old.js'), 'old');
      const diagnostics = new Diagnostics();

      const copied = copyDependencies([path.join(tmp, 'build')], outputDir, diagnostics);

      expect(copied).toEqual([path.join(tmp, 'build')]);
      expect(fs.readdirSync(path.join(outputDir, 'build'))).toEqual(['bundle.js']);
      expect(diagnostics.entries).toEqual([]);
    });

    it('warns about a missing dependency and copies the rest', () => {
      fs.outputFileSync(path.join(tmp, 'one/a.js'), 'a');
      fs.outputFileSync(path.join(tmp, 'two/b.js'), 'b');
      const missing = path.join(tmp, 'missing');
      const diagnostics = new Diagnostics();

      const copied = copyDependencies([path.join(tmp, 'one'), missing, path.join(tmp, 'two')], outputDir, diagnostics);

      expect(copied).toEqual([path.join(tmp, 'one'), path.join(tmp, 'two')]);
      expect(fs.existsSync(path.join(outputDir, 'one/a.js'))).toBe(true);
      expect(fs.existsSync(path.join(outputDir, 'two/b.js'))).toBe(true);
      expect(diagnostics.warnings()).toEqual([`Could not copy dependency: ${missing}`]);
    });

    it('ignores a dependency that is a file', () => {
      fs.outputFileSync(path.join(tmp, 'lib.js'), 'lib');
      const diagnostics = new Diagnostics();

      expect(copyDependencies([path.join(tmp, 'lib.js')], outputDir, diagnostics)).toEqual([]);
      expect(diagnostics.entries).toEqual([]);
    });
  });
});
