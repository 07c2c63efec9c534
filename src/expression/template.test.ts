import { describe, expect, it } from 'vitest';
import { ResourceExceededError } from '../types/errors.ts';
import { Template, TemplateError, renderTemplate } from './template.ts';

describe('renderTemplate', () => {
  const data = {
    name: 'Alice',
    count: 3,
    ratio: 0.5,
    tags: ['a', 'b', 'c'],
    user: { profile: { city: 'Oslo' } },
    items: [{ id: 1 }, { id: 2 }],
    empty: [],
    nothing: null,
    steps: { fetch: { text: 'done', status_code: 200 } },
  };

  it('should substitute field paths', () => {
    expect(renderTemplate('Hello {{.name}}!', data)).toBe('Hello Alice!');
    expect(renderTemplate('{{ .user.profile.city }}', data)).toBe('Oslo');
    expect(renderTemplate('{{.steps.fetch.status_code}}', data)).toBe('200');
  });

  it('should render missing references as <no value>', () => {
    expect(renderTemplate('{{.missing}}', data)).toBe('<no value>');
    expect(renderTemplate('{{.user.nope.deeper}}', data)).toBe('<no value>');
    expect(renderTemplate('{{.nothing}}', data)).toBe('<nil>');
  });

  it('should print collections the way templates print them', () => {
    expect(renderTemplate('{{.tags}}', data)).toBe('[a b c]');
    expect(renderTemplate('{{.user}}', data)).toBe('map[profile:map[city:Oslo]]');
  });

  it('should call functions with literal and field arguments', () => {
    expect(renderTemplate('{{add .count 2}}', data)).toBe('5');
    expect(renderTemplate('{{join .tags "-"}}', data)).toBe('a-b-c');
    expect(renderTemplate('{{upper (trim "  x ")}}', data)).toBe('X');
    expect(renderTemplate('{{mul .ratio 3}}', data)).toBe('1.5');
  });

  it('should pass piped values as the last argument', () => {
    expect(renderTemplate('{{.name | upper}}', data)).toBe('ALICE');
    expect(renderTemplate('{{.name | lower | print "hi"}}', data)).toBe('hi alice');
  });

  it('should support if, else if and else', () => {
    const source = '{{if eq .count 1}}one{{else if eq .count 3}}three{{else}}many{{end}}';
    expect(renderTemplate(source, data)).toBe('three');
    expect(renderTemplate('{{if .empty}}yes{{else}}no{{end}}', data)).toBe('no');
  });

  it('should range over arrays and maps', () => {
    expect(renderTemplate('{{range .tags}}[{{.}}]{{end}}', data)).toBe('[a][b][c]');
    expect(renderTemplate('{{range $i, $t := .tags}}{{$i}}={{$t}} {{end}}', data)).toBe(
      '0=a 1=b 2=c '
    );
    expect(renderTemplate('{{range $k, $v := .steps.fetch}}{{$k}};{{end}}', data)).toBe(
      'status_code;text;'
    );
    expect(renderTemplate('{{range .empty}}x{{else}}none{{end}}', data)).toBe('none');
    expect(renderTemplate('{{range .items}}{{.id}}{{end}}', data)).toBe('12');
  });

  it('should rebind dot with with', () => {
    expect(renderTemplate('{{with .user.profile}}{{.city}}{{end}}', data)).toBe('Oslo');
    expect(renderTemplate('{{with .missing}}x{{else}}fallback{{end}}', data)).toBe('fallback');
  });

  it('should support variables', () => {
    expect(renderTemplate('{{$n := .name}}{{$n}}/{{$.count}}', data)).toBe('Alice/3');
    expect(renderTemplate('{{$x := 1}}{{$x = 2}}{{$x}}', data)).toBe('2');
  });

  it('should trim whitespace around markers and drop comments', () => {
    expect(renderTemplate('a  {{- .name -}}  b', data)).toBe('aAliceb');
    expect(renderTemplate('x{{/* note */}}y', data)).toBe('xy');
    expect(renderTemplate('x {{- /* note */ -}} y', data)).toBe('xy');
  });

  it('should leave text without actions unchanged', () => {
    expect(renderTemplate('plain } { text', data)).toBe('plain } { text');
  });

  it('should surface function errors', () => {
    expect(() => renderTemplate('{{div 1 0}}', data)).toThrow(
      'template: error calling div: div: division by zero'
    );
  });

  it('should reject unknown functions and malformed actions', () => {
    expect(() => Template.parse('{{nope 1}}')).toThrow('template: function "nope" not defined');
    expect(() => Template.parse('{{.name')).toThrow(TemplateError);
    expect(() => Template.parse('{{if .x}}open')).toThrow('template: unexpected EOF in if');
    expect(() => Template.parse('{{end}}')).toThrow('template: unexpected {{end}}');
  });

  it('should cap output size', () => {
    const template = Template.parse('{{range .}}xxxxxxxxxx{{end}}', { maxOutput: 25 });
    expect(() => template.execute([1, 2, 3])).toThrow(ResourceExceededError);
    expect(template.execute([1, 2])).toBe('xxxxxxxxxxxxxxxxxxxx');
  });

  it('should evaluate a single action to its typed value', () => {
    const item = { tags: ['a', 'b'], n: 2 };
    expect(Template.parse('{{.tags}}').evaluate(item)).toEqual(['a', 'b']);
    expect(Template.parse('{{gt .n $.min}}').evaluate(item, { min: 1 })).toBe(true);
    expect(() => Template.parse('n={{.n}}').evaluate(item)).toThrow(
      'template: expression must be a single action'
    );
  });
});
