/**
 * @fileoverview Tests for template parsing, execution and the renderer
 */

import { describe, it, expect } from '@jest/globals';
import { BuildError, BuildErrorCode, Context, createContext } from '@crossbuild/core';
import { TemplateError } from '../errors';
import { Template, TemplateRenderer } from '../template';

const NOW = new Date('2024-01-02T03:04:05Z');

function testContext(): Context {
  return createContext({
    projectName: 'demo',
    git: { currentTag: 'v1.2.3', commit: 'abcdef0123456789' },
    env: { FOO: 'bar', HOME: '/home/test' },
    clock: () => NOW
  });
}

function renderError(source: string, renderer = TemplateRenderer.forContext(testContext())): BuildError {
  try {
    renderer.apply(source);
  } catch (error) {
    if (error instanceof BuildError) {
      return error;
    }
    throw error;
  }
  throw new Error(`expected ${source} to fail`);
}

describe('TemplateRenderer', () => {
  const renderer = TemplateRenderer.forContext(testContext());

  it.each([
    ['plain text', 'plain text'],
    ['{{ .ProjectName }}', 'demo'],
    ['{{ .Version }}', '1.2.3'],
    ['{{ .Tag }}', 'v1.2.3'],
    ['{{ .Commit }}', 'abcdef0123456789'],
    ['{{ .FullCommit }}', 'abcdef0123456789'],
    ['{{ .ShortCommit }}', 'abcdef0'],
    ['{{ .Date }}', '2024-01-02T03:04:05Z'],
    ['{{ .Timestamp }}', '1704164645'],
    ['{{ .Env.FOO }}', 'bar'],
    ['{{ .Env }}', 'map[FOO:bar HOME:/home/test]'],
    ['{{ time "20060102" }}', '20240102'],
    ['{{ time "2006-01-02T15:04:05Z07:00" }}', '2024-01-02T03:04:05Z'],
    ['{{ .ProjectName | toupper }}', 'DEMO'],
    ['{{ toupper "AbC" | tolower }}', 'abc'],
    ['{{ trim "  x  " }}', 'x'],
    ['{{ replace .Version "." "_" }}', '1_2_3'],
    ['x {{- .Version -}} y', 'x1.2.3y'],
    ['a{{/* comment */}}b', 'ab'],
    ['{{ `raw\\n` }}', 'raw\\n'],
    ['{{ "tab\\there" }}', 'tab\there'],
    ['{{ (.Version) }}', '1.2.3'],
    ['{{ 42 }} {{ true }}', '42 true'],
    ['{{ .Version }}\n{{ .Tag }}', '1.2.3\nv1.2.3']
  ])('renders %s', (source, expected) => {
    expect(renderer.apply(source)).toBe(expected);
  });

  it('falls back to a default tag', () => {
    const ctx = createContext({ env: {}, clock: () => NOW });
    expect(TemplateRenderer.forContext(ctx).apply('{{ .Tag }}')).toBe('v0.0.0');
  });

  it('adds target fields', () => {
    const target = renderer.withArtifact({
      target: { os: 'linux', arch: 'arm', arm: '7' },
      name: 'demo',
      binary: 'demo-bin'
    });

    expect(target.apply('{{.Os}}_{{.Arch}}_{{.Arm}} {{.ArtifactName}} {{.Binary}}')).toBe(
      'linux_arm_7 demo demo-bin'
    );
    expect(renderer.withArtifact({ target: { os: 'linux', arch: 'amd64' }, name: 'x' }).apply('[{{.Arm}}]')).toBe(
      '[]'
    );
  });

  it('leaves the original renderer untouched', () => {
    renderer.withFields(new Map([['Extra', 'value']]));
    expect(renderError('{{ .Extra }}', renderer).code).toBe(BuildErrorCode.TemplateExecution);
  });

  it('lets later fields win', () => {
    expect(renderer.withFields(new Map([['Version', 'override']])).apply('{{ .Version }}')).toBe('override');
  });
});

describe('parse errors', () => {
  it.each([
    ['{{.Version}', 'template: tmpl:1: unexpected "}" in operand'],
    ['{{ .Nope }', 'template: tmpl:1: unexpected "}" in operand'],
    ['{{ nope }}', 'template: tmpl:1: function "nope" not defined'],
    ['{{ }}', 'template: tmpl:1: missing value for command'],
    ['{{ "abc }}', 'template: tmpl:1: unterminated quoted string'],
    ['{{ .Version', 'template: tmpl:1: unclosed action'],
    ['{{ .Version\n', 'template: tmpl:2: unclosed action started at tmpl:1'],
    ['{{/* note', 'template: tmpl:1: unclosed comment'],
    ['{{ .A }}\n{{ @ }}', 'template: tmpl:2: unexpected "@" in command'],
    ['{{ .A | "x" }}', 'template: tmpl:1: non executable command in pipeline stage 2'],
    ['{{ "x".Y }}', 'template: tmpl:1: unexpected . after term "\\"x\\""']
  ])('rejects %s', (source, message) => {
    const error = renderError(source);

    expect(error.code).toBe(BuildErrorCode.TemplateParse);
    expect(error.message).toBe(message);
  });
});

describe('execution errors', () => {
  it.each([
    ['{{.Env.NOPE}}', 'template: tmpl:1:6: executing "tmpl" at <.Env.NOPE>: map has no entry for key "NOPE"'],
    ['{{ .Nope }}', 'template: tmpl:1:3: executing "tmpl" at <.Nope>: map has no entry for key "Nope"'],
    [
      '{{ .Version.Major }}',
      'template: tmpl:1:11: executing "tmpl" at <.Version.Major>: can\'t evaluate field Major in type string'
    ],
    [
      '{{ replace .Version "." }}',
      'template: tmpl:1:3: executing "tmpl" at <replace>: wrong number of args for replace: want 3 got 2'
    ],
    [
      '{{ .Version "x" }}',
      'template: tmpl:1:3: executing "tmpl" at <.Version>: Version is not a method but has arguments'
    ],
    [
      '{{ "x" "y" }}',
      'template: tmpl:1:3: executing "tmpl" at <"x">: can\'t give argument to non-function "x"'
    ],
    ['{{ tolower 3 }}', 'template: tmpl:1:11: executing "tmpl" at <3>: expected string; found 3'],
    [
      '{{ .Timestamp | tolower }}',
      'template: tmpl:1:16: executing "tmpl" at <tolower>: wrong type for value; expected string; got int'
    ],
    [
      '{{ .Env | tolower }}',
      'template: tmpl:1:10: executing "tmpl" at <tolower>: wrong type for value; expected string; got map[string]string'
    ],
    ['ok\n  {{ .Nope }}', 'template: tmpl:2:5: executing "tmpl" at <.Nope>: map has no entry for key "Nope"'],
    ['é{{.Env.NOPE}}', 'template: tmpl:1:8: executing "tmpl" at <.Env.NOPE>: map has no entry for key "NOPE"']
  ])('reports %s', (source, message) => {
    const error = renderError(source);

    expect(error.code).toBe(BuildErrorCode.TemplateExecution);
    expect(error.message).toBe(message);
  });

  it('wraps errors raised by functions', () => {
    const functions = new Map([
      [
        'fail',
        (): string => {
          throw new Error('boom');
        }
      ]
    ]);
    const template = Template.parse('{{ fail }}', functions);

    expect(() => template.execute(new Map())).toThrow(TemplateError);
    expect(() => template.execute(new Map())).toThrow(
      'template: tmpl:1:3: executing "tmpl" at <fail>: error calling fail: boom'
    );
  });
});
