import { NO_DATE, NO_TAGS } from '../types/task';
import { LabelMatcher } from './labels';
import { FilterableTask, FilterCriteria, QueryEngine, parseTextFilter } from './queryEngine';

const engine = new QueryEngine(new LabelMatcher(['FIXME', 'TODO'], 'Next:'));

const task = (id: number, parent: number, description: string, overrides: Partial<FilterableTask> = {}): FilterableTask => ({
  id,
  source: 1,
  parent,
  hasChildren: false,
  open: true,
  actionable: true,
  priority: 0,
  due: NO_DATE,
  description,
  documentName: 'Projects/Garden',
  ...overrides,
});

const all: FilterCriteria = { actionableOnly: false };

describe('parseTextFilter', () => {
  it('should return null for empty input', () => {
    expect(parseTextFilter('')).toBeNull();
    expect(parseTextFilter('   ')).toBeNull();
  });

  it('should lower case the needle', () => {
    expect(parseTextFilter(' Milk ')).toEqual({ negated: false, needle: 'milk' });
  });

  it('should negate on a leading "not"', () => {
    expect(parseTextFilter('NOT @Waiting')).toEqual({ negated: true, needle: '@waiting' });
    expect(parseTextFilter('nothing')).toEqual({ negated: false, needle: 'nothing' });
  });
});

describe('QueryEngine', () => {
  describe('matches', () => {
    it('should hide closed tasks', () => {
      expect(engine.matches(task(1, 0, 'done', { open: false }), all)).toBe(false);
    });

    it('should hide blocked tasks when only actionable ones are wanted', () => {
      const blocked = task(1, 0, 'Next: later', { actionable: false });

      expect(engine.matches(blocked, all)).toBe(true);
      expect(engine.matches(blocked, { actionableOnly: true })).toBe(false);
    });

    it('should filter by label ignoring case', () => {
      const criteria: FilterCriteria = { actionableOnly: false, labelFilter: ['fixme'] };

      expect(engine.matches(task(1, 0, 'FIXME broken link'), criteria)).toBe(true);
      expect(engine.matches(task(2, 0, 'TODO broken link'), criteria)).toBe(false);
      expect(engine.matches(task(3, 0, 'broken FIXME'), criteria)).toBe(false);
    });

    it('should filter by tag', () => {
      const criteria: FilterCriteria = { actionableOnly: false, tagFilter: ['Home'] };

      expect(engine.matches(task(1, 0, 'laundry @home'), criteria)).toBe(true);
      expect(engine.matches(task(2, 0, 'report @work'), criteria)).toBe(false);
    });

    it('should match untagged tasks with the no-tags marker', () => {
      const criteria: FilterCriteria = { actionableOnly: false, tagFilter: [NO_TAGS] };

      expect(engine.matches(task(1, 0, 'laundry'), criteria)).toBe(true);
      expect(engine.matches(task(2, 0, 'laundry @home'), criteria)).toBe(false);
    });

    it('should combine the no-tags marker with real tags', () => {
      const tasks = [
        task(1, 0, 'untagged chore'),
        task(2, 0, 'fix the roof @Urgent'),
        task(3, 0, 'read a book @other'),
      ];

      const visible = engine.filterVisible(tasks, { actionableOnly: false, tagFilter: [NO_TAGS, 'urgent'] });

      expect([...visible].sort()).toEqual([1, 2]);
    });

    it('should use the given tags over the description', () => {
      const criteria: FilterCriteria = { actionableOnly: false, tagFilter: ['garden'] };

      expect(engine.matches(task(1, 0, 'mow the lawn', { tags: ['Garden'] }), criteria)).toBe(true);
    });

    it('should search description and document name', () => {
      expect(engine.matches(task(1, 0, 'Buy Milk'), { actionableOnly: false, textFilter: parseTextFilter('milk') })).toBe(true);
      expect(engine.matches(task(2, 0, 'mow'), { actionableOnly: false, textFilter: parseTextFilter('garden') })).toBe(true);
      expect(engine.matches(task(3, 0, 'mow'), { actionableOnly: false, textFilter: parseTextFilter('milk') })).toBe(false);
    });

    it('should invert a negated text filter', () => {
      const criteria: FilterCriteria = { actionableOnly: false, textFilter: parseTextFilter('not @waiting') };

      expect(engine.matches(task(1, 0, 'call plumber @waiting'), criteria)).toBe(false);
      expect(engine.matches(task(2, 0, 'call plumber'), criteria)).toBe(true);
    });
  });

  describe('filterVisible', () => {
    const tree = [
      task(1, 0, 'renovate'),
      task(2, 1, 'paint walls'),
      task(3, 2, 'buy paint @errand'),
      task(4, 1, 'fix door'),
      task(5, 0, 'taxes'),
    ];

    it('should show the ancestors of a match', () => {
      const visible = engine.filterVisible(tree, { actionableOnly: false, tagFilter: ['errand'] });

      expect([...visible].sort()).toEqual([1, 2, 3]);
    });

    it('should show everything without criteria', () => {
      expect(engine.filterVisible(tree, all).size).toBe(5);
    });

    it('should stop at parents that are not in the list', () => {
      const orphan = [task(9, 8, 'orphan @errand')];

      expect([...engine.filterVisible(orphan, { actionableOnly: false, tagFilter: ['errand'] })]).toEqual([9]);
    });
  });
});
