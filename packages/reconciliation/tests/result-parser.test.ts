import { afterEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { NotFoundError, ParseError, flattenResults } from '@testsync/core';
import { parseDuration, parseTestResults, parseTestResultsXml } from '../src/index.js';

const REPORT = `<?xml version="1.0" encoding="UTF-8"?>
<testsuites>
  <testsuite name="shop">
    <testcase classname="tests.shop" name="test_checkout_flow" time="1.25"/>
    <testcase classname="tests.shop" name="test_refund" time="0.5">
      <failure message="assert 200 == 500">Traceback line</failure>
    </testcase>
    <testsuite name="nested">
      <testcase classname="tests.shop.nested" name="test_login_success" time="abc">
        <skipped message="flaky"/>
      </testcase>
      <testcase name="search_returns_items">
        <error message="timeout">boom</error>
        <failure message="also failed"/>
      </testcase>
    </testsuite>
  </testsuite>
</testsuites>`;

let tmpDir = '';

afterEach(() => {
  if (tmpDir) {
    rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = '';
  }
});

describe('parseTestResultsXml', () => {
  it('classifies every test case exactly once across nested suites', () => {
    const results = parseTestResultsXml(REPORT);

    expect(results.passed).toEqual([
      {
        classname: 'tests.shop',
        name: 'test_checkout_flow',
        fullName: 'tests.shop.test_checkout_flow',
        cleanName: 'checkout_flow',
        duration: 1.25,
        category: 'passed',
      },
    ]);
    expect(results.failed.map((r) => r.name)).toEqual(['test_refund', 'search_returns_items']);
    expect(results.skipped.map((r) => r.name)).toEqual(['test_login_success']);
    expect(results.error).toEqual([]);
    expect(flattenResults(results)).toHaveLength(4);
  });

  it('captures the message and body of the winning marker', () => {
    const results = parseTestResultsXml(REPORT);

    expect(results.failed[0]).toMatchObject({
      message: 'assert 200 == 500',
      text: 'Traceback line',
      duration: 0.5,
    });
    // failure outranks error on the same test case
    expect(results.failed[1]).toMatchObject({
      classname: '',
      fullName: 'search_returns_items',
      cleanName: 'search_returns_items',
      message: 'also failed',
      text: '',
    });
    expect(results.skipped[0]).toMatchObject({ message: 'flaky', text: '', duration: 0 });
  });

  it('categorizes error markers without a failure as error', () => {
    const results = parseTestResultsXml(
      '<testsuite><testcase name="test_sync"><error message="db down">stack</error></testcase></testsuite>'
    );

    expect(results.error).toHaveLength(1);
    expect(results.error[0]).toMatchObject({ category: 'error', message: 'db down', text: 'stack' });
  });

  it('strips exactly one leading test_ prefix', () => {
    const results = parseTestResultsXml(
      '<testsuite>' +
        '<testcase name="test_login_success"/>' +
        '<testcase name="login_success"/>' +
        '<testcase name="test_test_export"/>' +
        '<testcase name="Test_upper"/>' +
        '</testsuite>'
    );

    expect(results.passed.map((r) => r.cleanName)).toEqual([
      'login_success',
      'login_success',
      'test_export',
      'Test_upper',
    ]);
  });

  it('accepts a bare testcase root', () => {
    const results = parseTestResultsXml('<testcase classname="smoke" name="test_ping" time="-3"/>');

    expect(results.passed).toHaveLength(1);
    expect(results.passed[0]).toMatchObject({ fullName: 'smoke.test_ping', duration: 0 });
  });

  it('keeps document order when test cases follow a nested suite', () => {
    const results = parseTestResultsXml(
      '<testsuite>' +
        '<testcase name="a"/>' +
        '<testsuite><testcase name="b"/><testcase name="d"><failure/></testcase></testsuite>' +
        '<testcase name="c"/>' +
        '<testcase name="e"><failure/></testcase>' +
        '</testsuite>'
    );

    expect(results.passed.map((r) => r.name)).toEqual(['a', 'b', 'c']);
    expect(results.failed.map((r) => r.name)).toEqual(['d', 'e']);
  });

  it('decodes character references in attributes and text', () => {
    const results = parseTestResultsXml(
      '<testsuite>' +
        '<testcase classname="menu" name="test_caf&#233;_menu">' +
        '<failure message="line1&#10;line2">expected &#x2192; actual</failure>' +
        '</testcase>' +
        '</testsuite>'
    );

    expect(results.failed[0]).toMatchObject({
      name: 'test_café_menu',
      cleanName: 'café_menu',
      fullName: 'menu.test_café_menu',
      message: 'line1\nline2',
      text: 'expected → actual',
    });
  });

  it('treats a test case with only text content as a nameless passed test', () => {
    const results = parseTestResultsXml('<testsuite><testcase>legacy output</testcase></testsuite>');

    expect(results.passed).toEqual([
      { classname: '', name: '', fullName: '', cleanName: '', duration: 0, category: 'passed' },
    ]);
  });

  it('returns empty categories for a report without test cases', () => {
    expect(parseTestResultsXml('<testsuites/>')).toEqual({
      passed: [],
      failed: [],
      skipped: [],
      error: [],
    });
  });

  it('rejects malformed documents', () => {
    expect(() => parseTestResultsXml('<testsuite><testcase name="a"></testsuite>')).toThrow(ParseError);
    expect(() => parseTestResultsXml('')).toThrow(ParseError);
  });
});

describe('parseDuration', () => {
  it('falls back to 0 for missing, invalid and negative values', () => {
    expect(parseDuration('2.5')).toBe(2.5);
    expect(parseDuration(undefined)).toBe(0);
    expect(parseDuration('fast')).toBe(0);
    expect(parseDuration('-1')).toBe(0);
  });
});

describe('parseTestResults', () => {
  it('reads a report from disk', async () => {
    tmpDir = mkdtempSync(join(tmpdir(), 'reconciliation-'));
    const path = join(tmpDir, 'junit.xml');
    writeFileSync(path, REPORT);

    const results = await parseTestResults(path);

    expect(flattenResults(results).map((r) => r.cleanName)).toEqual([
      'checkout_flow',
      'refund',
      'search_returns_items',
      'login_success',
    ]);
  });

  it('raises NotFoundError for a missing file', async () => {
    tmpDir = mkdtempSync(join(tmpdir(), 'reconciliation-'));
    const path = join(tmpDir, 'missing.xml');

    await expect(parseTestResults(path)).rejects.toBeInstanceOf(NotFoundError);
    await expect(parseTestResults(path)).rejects.toThrow(`XML file not found: ${path}`);
  });

  it('raises ParseError for a malformed file', async () => {
    tmpDir = mkdtempSync(join(tmpdir(), 'reconciliation-'));
    const path = join(tmpDir, 'broken.xml');
    writeFileSync(path, '<testsuite><testcase>');

    await expect(parseTestResults(path)).rejects.toBeInstanceOf(ParseError);
  });
});
