import { Item, NO_DATE, TaskFields, TaskNode } from '../types/task';
import { parseMarkdown } from '../notebook/markdown';
import { LabelMatcher } from './labels';
import { detectHeader, TaskExtractor } from './taskExtractor';

const matcher = new LabelMatcher(['FIXME', 'TODO'], 'Next:');

const line = (text: string): Item => ({ kind: 'text', text });
const unchecked = (text: string, level = 0): Item => ({ kind: 'entry', bullet: 'unchecked', level, text });
const checked = (text: string, level = 0): Item => ({ kind: 'entry', bullet: 'checked', level, text });
const cancelled = (text: string, level = 0): Item => ({ kind: 'entry', bullet: 'cancelled', level, text });
const bullet = (text: string, level = 0): Item => ({ kind: 'entry', bullet: 'bullet', level, text });

const descriptions = (tasks: TaskNode[]): unknown[] =>
  tasks.map((task) => (task.children.length > 0
    ? [task.fields.description, descriptions(task.children)]
    : task.fields.description));

const fields = (overrides: Partial<TaskFields>): TaskFields => ({
  open: true,
  actionable: true,
  priority: 0,
  due: NO_DATE,
  description: '',
  ...overrides,
});

describe('detectHeader', () => {
  it('should detect a label with tags above a list', () => {
    expect(detectHeader([line('TODO: @work @urgent'), unchecked('a')], matcher)).toEqual({
      kind: 'header',
      tags: ['@work', '@urgent'],
    });
  });

  it('should detect a bare label above a list', () => {
    expect(detectHeader([line('TODO:'), unchecked('a')], matcher)).toEqual({ kind: 'header', tags: [] });
  });

  it('should not treat a label with other words as a header', () => {
    expect(detectHeader([line('TODO call the bank'), unchecked('a')], matcher)).toEqual({ kind: 'content' });
  });

  it('should need a list right below the header line', () => {
    expect(detectHeader([line('TODO: @work')], matcher)).toEqual({ kind: 'content' });
    expect(detectHeader([line('TODO: @work'), line('more text')], matcher)).toEqual({ kind: 'content' });
  });

  it('should need a label', () => {
    expect(detectHeader([line('Shopping: @home'), unchecked('a')], matcher)).toEqual({ kind: 'content' });
  });
});

describe('TaskExtractor', () => {
  const extractor = new TaskExtractor(matcher, { allCheckboxes: true });

  it('should turn labelled lines into top level tasks', () => {
    const tasks = extractor.extractSection([line('TODO call the bank'), line('just a note')]);

    expect(tasks).toEqual([{ fields: fields({ description: 'TODO call the bank' }), children: [] }]);
  });

  it('should nest checkbox entries', () => {
    const tasks = extractor.extractSection([
      unchecked('parent'),
      unchecked('child', 1),
      unchecked('grandchild', 2),
      unchecked('second child', 1),
      unchecked('sibling'),
    ]);

    expect(descriptions(tasks)).toEqual([
      ['parent', [['child', ['grandchild']], 'second child']],
      'sibling',
    ]);
  });

  it('should prune the entries below a plain bullet', () => {
    const tasks = extractor.extractSection([
      bullet('a note'),
      unchecked('hidden', 1),
      unchecked('after the note'),
    ]);

    expect(descriptions(tasks)).toEqual(['after the note']);
  });

  it('should take labelled bullets as tasks', () => {
    const tasks = extractor.extractSection([bullet('FIXME broken link'), bullet('plain')]);

    expect(descriptions(tasks)).toEqual(['FIXME broken link']);
  });

  it('should close checked and cancelled entries', () => {
    const tasks = extractor.extractSection([checked('done'), cancelled('dropped'), unchecked('open')]);

    expect(tasks.map((task) => task.fields.open)).toEqual([false, false, true]);
  });

  it('should start a new list after a plain line', () => {
    const tasks = extractor.extractSection([
      unchecked('first'),
      line('in between'),
      unchecked('not a child', 1),
    ]);

    expect(descriptions(tasks)).toEqual(['first', 'not a child']);
  });

  it('should inherit date and priority from the parent', () => {
    const [parent] = extractor.extractSection([
      unchecked('parent !! [d:2024-03-01]'),
      unchecked('child', 1),
      unchecked('urgent child !!! [d:2024-02-01]', 1),
    ]);

    expect(parent.fields).toEqual(fields({ priority: 2, due: '2024-03-01', description: 'parent !!' }));
    expect(parent.children.map((child) => child.fields)).toEqual([
      fields({ priority: 2, due: '2024-03-01', description: 'child' }),
      fields({ priority: 3, due: '2024-02-01', description: 'urgent child !!!' }),
    ]);
  });

  it('should only make the first open next item actionable', () => {
    const tasks = extractor.extractSection([
      checked('Next: step one'),
      unchecked('Next: step two'),
      unchecked('Next: step three'),
    ]);

    expect(tasks.map((task) => task.fields.actionable)).toEqual([true, true, false]);
  });

  it('should ignore checkboxes outside a task list without allCheckboxes', () => {
    const strict = new TaskExtractor(matcher, { allCheckboxes: false });

    expect(strict.extractSection([unchecked('groceries'), unchecked('TODO taxes')]).map((t) => t.fields.description))
      .toEqual(['TODO taxes']);
  });

  it('should take every checkbox below a header and add its tags', () => {
    const strict = new TaskExtractor(matcher, { allCheckboxes: false });

    const tasks = strict.extractSection([line('TODO: @home'), unchecked('groceries'), unchecked('laundry @home')]);

    expect(descriptions(tasks)).toEqual(['groceries @home', 'laundry @home']);
  });

  it('should use the default date of the document', () => {
    const withDeadline = new TaskExtractor(matcher, { allCheckboxes: true, defaultDate: '2024-04-30' });

    const [parent] = withDeadline.extractSection([unchecked('plan'), unchecked('book rooms', 1)]);

    expect(parent.fields.due).toBe('2024-04-30');
    expect(parent.children[0].fields.due).toBe('2024-04-30');
  });

  it('should extract the tasks of a whole document', () => {
    const tree = parseMarkdown([
      'TODO: @work',
      '- [ ] Collect numbers [d:2024-03-01]',
      '  - [ ] Ask finance !!',
      '    - [x] Send mail',
      '- plain note',
      '  - [ ] hidden',
      '- [ ] Next: write report',
      '',
      'Some text.',
      '',
      'TODO water the plants',
      '',
    ].join('\n'));

    const tasks = extractor.extract(tree);

    expect(tasks).toEqual([
      {
        fields: fields({ due: '2024-03-01', description: 'Collect numbers @work' }),
        children: [
          {
            fields: fields({ priority: 2, due: '2024-03-01', description: 'Ask finance !! @work' }),
            children: [
              {
                fields: fields({ open: false, priority: 2, due: '2024-03-01', description: 'Send mail @work' }),
                children: [],
              },
            ],
          },
        ],
      },
      { fields: fields({ actionable: false, description: 'Next: write report @work' }), children: [] },
      { fields: fields({ description: 'TODO water the plants' }), children: [] },
    ]);
  });
});
