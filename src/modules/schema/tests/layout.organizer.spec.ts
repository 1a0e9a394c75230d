import type { FieldPropertyMap, Layout } from '../../../lib/form';
import { createEngine, thrown } from './engine.fixtures';

const FIELDS: FieldPropertyMap = {
  title: { type: 'SINGLE_LINE_TEXT', code: 'title', label: 'Title' },
  notes: { type: 'MULTI_LINE_TEXT', code: 'notes', label: 'Notes' },
  items: {
    type: 'SUBTABLE',
    code: 'items',
    label: 'Items',
    fields: { qty: { type: 'NUMBER', code: 'qty', label: 'Qty' } },
  },
  orders: { type: 'REFERENCE_TABLE', code: 'orders', label: 'Orders' },
  レコード番号: { type: 'RECORD_NUMBER', code: 'レコード番号', label: 'Record number' },
  ステータス: { type: 'STATUS', code: 'ステータス', label: 'Status' },
  info: { type: 'GROUP', code: 'info', label: 'Info' },
};

const INFO_GROUP = {
  type: 'GROUP',
  code: 'info',
  openGroup: true,
  layout: [{ type: 'ROW', fields: [{ type: 'REFERENCE_TABLE', code: 'orders' }] }],
} as const;

const LAYOUT: Layout = [
  { type: 'ROW', fields: [{ type: 'SINGLE_LINE_TEXT', code: 'title' }] },
  INFO_GROUP,
  { type: 'SUBTABLE', code: 'items' },
];

describe('LayoutOrganizer', () => {
  const { organizer } = createEngine();

  describe('extractFieldCodes / findMissing', () => {
    it('collects row entries, group contents and tables', () => {
      const codes = organizer.extractFieldCodes([
        ...LAYOUT,
        { type: 'ROW', fields: [{ type: 'LABEL', label: 'x' }, { type: 'SPACER' }] },
        { type: 'ROW', fields: [{ type: 'GROUP', code: 'info' }] },
      ]);
      expect([...codes].sort()).toEqual(['items', 'orders', 'title']);
    });

    it('skips system, managed and layout-only fields', () => {
      expect([...organizer.findMissing(LAYOUT, FIELDS)]).toEqual(['notes']);
    });
  });

  describe('reconcile', () => {
    it('returns the layout unchanged when nothing is missing', () => {
      const complete = [...LAYOUT, { type: 'ROW', fields: [{ type: 'MULTI_LINE_TEXT', code: 'notes' }] } as const];
      expect(organizer.reconcile(complete, FIELDS, true)).toEqual({
        layout: complete,
        warnings: [],
        missing: [],
      });
    });

    it('only reports missing fields without autoFix', () => {
      const result = organizer.reconcile(LAYOUT, FIELDS, false);
      expect(result.layout).toEqual(LAYOUT);
      expect(result.missing).toEqual(['notes']);
      expect(result.warnings).toEqual([
        'Layout is missing 1 field(s): notes. Call again with autoFix: true to append them',
      ]);
    });

    it('appends a missing field as a trailing ROW', () => {
      const result = organizer.reconcile(LAYOUT, FIELDS, true);
      expect(result.layout).toHaveLength(4);
      expect(result.layout[3]).toEqual({
        type: 'ROW',
        fields: [{ type: 'MULTI_LINE_TEXT', code: 'notes' }],
      });
      expect(result.warnings).toEqual(['Field "notes" was not in the layout; appended as a ROW']);
      expect(LAYOUT).toHaveLength(3);
    });

    it('changes nothing on a second run', () => {
      const once = organizer.reconcile(LAYOUT, FIELDS, true);
      const twice = organizer.reconcile(once.layout, FIELDS, true);
      expect(twice.layout).toEqual(once.layout);
      expect(twice.warnings).toEqual([]);
    });

    it('prunes stale entries and containers before appending', () => {
      const stale: Layout = [
        {
          type: 'ROW',
          fields: [
            { type: 'SINGLE_LINE_TEXT', code: 'title' },
            { type: 'NUMBER', code: 'old_field' },
          ],
        },
        { type: 'ROW', fields: [{ type: 'DATE', code: 'gone' }] },
        {
          type: 'GROUP',
          code: 'old_group',
          openGroup: true,
          layout: [{ type: 'ROW', fields: [{ type: 'NUMBER', code: 'gone_too' }] }],
        },
        INFO_GROUP,
        { type: 'SUBTABLE', code: 'items' },
        { type: 'SUBTABLE', code: 'old_table' },
      ];
      const result = organizer.reconcile(stale, FIELDS, true);
      expect(result.layout).toEqual([
        { type: 'ROW', fields: [{ type: 'SINGLE_LINE_TEXT', code: 'title' }] },
        INFO_GROUP,
        { type: 'SUBTABLE', code: 'items' },
        { type: 'ROW', fields: [{ type: 'MULTI_LINE_TEXT', code: 'notes' }] },
      ]);
      expect(result.warnings).toEqual([
        'layout[0]: removed NUMBER "old_field"; it is not a field of the form',
        'layout[1]: removed DATE "gone"; it is not a field of the form',
        'layout[1]: removed ROW; nothing was left in it',
        'layout[2].layout[0]: removed NUMBER "gone_too"; it is not a field of the form',
        'layout[2].layout[0]: removed ROW; nothing was left in it',
        'layout[2]: removed GROUP "old_group"; nothing was left in it',
        'layout[5]: removed SUBTABLE "old_table"; it is not a field of the form',
        'Field "notes" was not in the layout; appended as a ROW',
      ]);
    });

    it('prunes stale entries even when no field is missing', () => {
      const fields: FieldPropertyMap = { title: FIELDS.title };
      const result = organizer.reconcile(
        [
          { type: 'ROW', fields: [{ type: 'SINGLE_LINE_TEXT', code: 'title' }] },
          { type: 'ROW', fields: [{ type: 'NUMBER', code: 'deleted_field' }] },
          { type: 'SUBTABLE', code: 'deleted_table' },
        ],
        fields,
        true,
      );
      expect(result).toEqual({
        layout: [{ type: 'ROW', fields: [{ type: 'SINGLE_LINE_TEXT', code: 'title' }] }],
        warnings: [
          'layout[1]: removed NUMBER "deleted_field"; it is not a field of the form',
          'layout[1]: removed ROW; nothing was left in it',
          'layout[2]: removed SUBTABLE "deleted_table"; it is not a field of the form',
        ],
        missing: [],
      });
    });

    it('keeps the fields of a group whose own code is not a field', () => {
      const fields: FieldPropertyMap = { title: FIELDS.title, notes: FIELDS.notes };
      const legacy = {
        type: 'GROUP',
        code: 'old_group',
        openGroup: true,
        layout: [{ type: 'ROW', fields: [{ type: 'SINGLE_LINE_TEXT', code: 'title' }] }],
      } as const;

      const once = organizer.reconcile([legacy], fields, true);
      expect(once.layout).toEqual([
        legacy,
        { type: 'ROW', fields: [{ type: 'MULTI_LINE_TEXT', code: 'notes' }] },
      ]);
      expect(once.missing).toEqual(['notes']);

      const twice = organizer.reconcile(once.layout, fields, true);
      expect(twice).toEqual({ layout: once.layout, warnings: [], missing: [] });
    });

    it('appends in field definition order and reports the codes sorted', () => {
      const result = organizer.reconcile(
        [{ type: 'GROUP', code: 'info', openGroup: true, layout: [{ type: 'ROW', fields: [{ type: 'NUMBER', code: 'x' }] }] }],
        FIELDS,
        true,
      );
      expect(result.missing).toEqual(['items', 'notes', 'orders', 'title']);
      expect(result.layout).toEqual([
        { type: 'ROW', fields: [{ type: 'SINGLE_LINE_TEXT', code: 'title' }] },
        { type: 'ROW', fields: [{ type: 'MULTI_LINE_TEXT', code: 'notes' }] },
        { type: 'SUBTABLE', code: 'items' },
        { type: 'ROW', fields: [{ type: 'REFERENCE_TABLE', code: 'orders' }] },
      ]);
      expect(result.warnings.slice(0, 3)).toEqual([
        'layout[0].layout[0]: removed NUMBER "x"; it is not a field of the form',
        'layout[0].layout[0]: removed ROW; nothing was left in it',
        'layout[0]: removed GROUP "info"; nothing was left in it',
      ]);
    });
  });

  describe('organize', () => {
    const fields: FieldPropertyMap = {
      a: { type: 'SINGLE_LINE_TEXT', code: 'a', label: 'A' },
      b: { type: 'NUMBER', code: 'b', label: 'B' },
      t: { type: 'SUBTABLE', code: 't', label: 'T', fields: {} },
      c: { type: 'DATE', code: 'c', label: 'C' },
    };

    it('packs unplaced fields into rows', () => {
      const result = organizer.organize([], fields, 2);
      expect(result.layout).toEqual([
        {
          type: 'ROW',
          fields: [
            { type: 'SINGLE_LINE_TEXT', code: 'a' },
            { type: 'NUMBER', code: 'b' },
          ],
        },
        { type: 'SUBTABLE', code: 't' },
        { type: 'ROW', fields: [{ type: 'DATE', code: 'c' }] },
      ]);
      expect(result.missing).toEqual(['a', 'b', 'c', 't']);

      const again = organizer.organize(result.layout, fields, 2);
      expect(again).toEqual({ layout: result.layout, warnings: [], missing: [] });
    });

    it('rejects a non-positive row width', () => {
      const err = thrown(() => organizer.organize([], fields, 0));
      expect(err.kind).toBe('NumericBoundsInvalid');
      expect(err.path).toBe('fieldsPerRow');
    });
  });

  describe('removeFields', () => {
    it('removes codes and the containers they leave empty', () => {
      const result = organizer.removeFields(LAYOUT, ['orders', 'title', 'nope']);
      expect(result.layout).toEqual([{ type: 'SUBTABLE', code: 'items' }]);
      expect(result.warnings).toEqual([
        'layout[0]: removed SINGLE_LINE_TEXT "title"; removal was requested',
        'layout[0]: removed ROW; nothing was left in it',
        'layout[1].layout[0]: removed REFERENCE_TABLE "orders"; removal was requested',
        'layout[1].layout[0]: removed ROW; nothing was left in it',
        'layout[1]: removed GROUP "info"; nothing was left in it',
        'Field "nope" is not in the layout; nothing to remove',
      ]);
    });
  });

  describe('groupFields', () => {
    const fields: FieldPropertyMap = {
      title: FIELDS.title,
      amount: { type: 'NUMBER', code: 'amount', label: 'Amount' },
      due: { type: 'DATE', code: 'due', label: 'Due' },
      memo: { type: 'MULTI_LINE_TEXT', code: 'memo', label: 'Memo' },
    };
    const layout: Layout = [
      {
        type: 'ROW',
        fields: [
          { type: 'SINGLE_LINE_TEXT', code: 'title', size: { width: '300' } },
          { type: 'NUMBER', code: 'amount' },
        ],
      },
      { type: 'ROW', fields: [{ type: 'DATE', code: 'due' }] },
    ];

    it('moves fields into a new group, keeping placed sizes', () => {
      const result = organizer.groupFields(layout, fields, {
        code: 'main',
        label: 'Main',
        fieldCodes: ['title', 'due', 'memo'],
        fieldsPerRow: 2,
      });
      expect(result.layout).toEqual([
        { type: 'ROW', fields: [{ type: 'NUMBER', code: 'amount' }] },
        {
          type: 'GROUP',
          code: 'main',
          label: 'Main',
          openGroup: true,
          layout: [
            {
              type: 'ROW',
              fields: [
                { type: 'SINGLE_LINE_TEXT', code: 'title', size: { width: '300' } },
                { type: 'DATE', code: 'due' },
              ],
            },
            { type: 'ROW', fields: [{ type: 'MULTI_LINE_TEXT', code: 'memo' }] },
          ],
        },
      ]);
      expect(result.warnings).toEqual([
        'layout[0]: removed SINGLE_LINE_TEXT "title"; it was moved into group "main"',
        'layout[1]: removed DATE "due"; it was moved into group "main"',
        'layout[1]: removed ROW; nothing was left in it',
      ]);
    });

    it('rejects tables, unknown codes and duplicate groups', () => {
      const table = thrown(() =>
        organizer.groupFields(LAYOUT, FIELDS, { code: 'main', label: 'Main', fieldCodes: ['items'] }),
      );
      expect(table.message).toBe('A GROUP cannot contain a SUBTABLE (group "main"); "items" is a SUBTABLE');

      const unknown = thrown(() =>
        organizer.groupFields(LAYOUT, FIELDS, { code: 'main', label: 'Main', fieldCodes: ['zzz'] }),
      );
      expect(unknown.kind).toBe('FieldConfigInvalid');
      expect(unknown.path).toBe('group.fieldCodes[0]');

      const duplicate = thrown(() =>
        organizer.groupFields(LAYOUT, FIELDS, { code: 'info', label: 'Info', fieldCodes: ['title'] }),
      );
      expect(duplicate.message).toBe('Group "info" already exists in the layout');
    });
  });

  describe('analyze', () => {
    it('counts nodes, coded entries, groups and tables', () => {
      const summary = organizer.analyze([
        ...LAYOUT,
        { type: 'ROW', fields: [{ type: 'LABEL', label: 'Note' }, { type: 'NUMBER', code: 'n' }] },
      ]);
      expect(summary).toEqual({
        totalElements: 4,
        elementTypes: { ROW: 2, GROUP: 1, SUBTABLE: 1 },
        fieldCount: 3,
        groups: [{ code: 'info', fieldCount: 1 }],
        subtables: [{ code: 'items' }],
      });
    });
  });

  describe('correctWidths', () => {
    const fields: FieldPropertyMap = {
      customer: {
        type: 'SINGLE_LINE_TEXT',
        code: 'customer',
        label: 'Customer',
        lookup: {
          relatedApp: { app: '12' },
          relatedKeyField: 'id',
          fieldMappings: [{ field: 'customer_name', relatedField: 'name' }],
        },
      },
      memo: { type: 'MULTI_LINE_TEXT', code: 'memo', label: 'Memo', _recommendedMinWidth: '400' },
      title: { type: 'SINGLE_LINE_TEXT', code: 'title', label: 'Title' },
    };
    const layout: Layout = [
      {
        type: 'ROW',
        fields: [
          { type: 'SINGLE_LINE_TEXT', code: 'customer' },
          { type: 'SINGLE_LINE_TEXT', code: 'title', size: { width: '100' } },
        ],
      },
      {
        type: 'GROUP',
        code: 'g',
        openGroup: true,
        layout: [
          { type: 'ROW', fields: [{ type: 'MULTI_LINE_TEXT', code: 'memo', size: { width: '300', height: '80' } }] },
        ],
      },
    ];

    it('gives an unsized lookup field the minimum width', () => {
      const { layout: out, guidances } = organizer.correctWidths(layout, fields);
      expect(out[0]).toEqual({
        type: 'ROW',
        fields: [
          { type: 'SINGLE_LINE_TEXT', code: 'customer', size: { width: '250' } },
          { type: 'SINGLE_LINE_TEXT', code: 'title', size: { width: '100' } },
        ],
      });
      expect(guidances[0]).toBe('Field "customer": width set to 250px, the minimum for this field');
    });

    it('raises fields in groups to their recommended width', () => {
      const { layout: out, guidances } = organizer.correctWidths(layout, fields);
      expect(out[1]).toEqual({
        type: 'GROUP',
        code: 'g',
        openGroup: true,
        layout: [
          { type: 'ROW', fields: [{ type: 'MULTI_LINE_TEXT', code: 'memo', size: { width: '400', height: '80' } }] },
        ],
      });
      expect(guidances).toHaveLength(2);
      expect(guidances[1]).toBe('Field "memo": width 300px is below the 400px minimum; set to 400px');
    });

    it('is idempotent', () => {
      const once = organizer.correctWidths(layout, fields);
      const twice = organizer.correctWidths(once.layout, fields);
      expect(twice.layout).toEqual(once.layout);
      expect(twice.guidances).toEqual([]);
    });

    it('uses the configured minimum', () => {
      const wide = createEngine({ lookupMinWidth: 320 }).organizer;
      const { layout: out } = wide.correctWidths(layout, fields);
      expect(out[0]).toMatchObject({
        fields: [{ code: 'customer', size: { width: '320' } }, { code: 'title' }],
      });
    });
  });

  describe('insertAt', () => {
    const newRow = { type: 'ROW', fields: [{ type: 'NUMBER', code: 'amount' }] } as const;
    const amount = { type: 'NUMBER', code: 'amount' } as const;

    it('appends without a position and clamps a large index', () => {
      expect(organizer.insertAt(LAYOUT, newRow)).toEqual([...LAYOUT, newRow]);
      expect(organizer.insertAt(LAYOUT, newRow, { index: 99 })).toEqual([...LAYOUT, newRow]);
    });

    it('inserts at a top-level index', () => {
      expect(organizer.insertAt(LAYOUT, newRow, { index: 0 })).toEqual([newRow, ...LAYOUT]);
      expect(LAYOUT).toHaveLength(3);
    });

    it('inserts rows into a group', () => {
      const out = organizer.insertAt(LAYOUT, newRow, { type: 'GROUP', groupCode: 'info', index: 0 });
      expect(out[1]).toEqual({ ...INFO_GROUP, layout: [newRow, ...INFO_GROUP.layout] });
    });

    it('rejects an unknown group and non-row entries for a group', () => {
      const missing = thrown(() =>
        organizer.insertAt(LAYOUT, newRow, { type: 'GROUP', groupCode: 'nope' }),
      );
      expect(missing.kind).toBe('LayoutPositionInvalid');
      expect(missing.message).toBe('Group "nope" does not exist in the layout');
      expect(
        thrown(() => organizer.insertAt(LAYOUT, amount, { type: 'GROUP', groupCode: 'info' })).kind,
      ).toBe('LayoutStructuralViolation');
    });

    it('inserts an entry next to a field in a row', () => {
      const out = organizer.insertAt(LAYOUT, amount, { after: 'title' });
      expect(out[0]).toEqual({
        type: 'ROW',
        fields: [{ type: 'SINGLE_LINE_TEXT', code: 'title' }, amount],
      });
    });

    it('searches rows inside groups', () => {
      const out = organizer.insertAt(LAYOUT, amount, { before: 'orders' });
      expect(out[1]).toEqual({
        ...INFO_GROUP,
        layout: [{ type: 'ROW', fields: [amount, { type: 'REFERENCE_TABLE', code: 'orders' }] }],
      });
    });

    it('places a row next to the row that holds the target', () => {
      expect(organizer.insertAt(LAYOUT, newRow, { after: 'title' })).toEqual([
        LAYOUT[0],
        newRow,
        LAYOUT[1],
        LAYOUT[2],
      ]);
      const out = organizer.insertAt(LAYOUT, newRow, { after: 'orders' });
      expect(out[1]).toEqual({ ...INFO_GROUP, layout: [...INFO_GROUP.layout, newRow] });
    });

    it('places a node next to a table', () => {
      expect(organizer.insertAt(LAYOUT, newRow, { after: 'items' })).toEqual([...LAYOUT, newRow]);
    });

    it('keeps containment rules', () => {
      expect(thrown(() => organizer.insertAt(LAYOUT, amount)).kind).toBe('LayoutStructuralViolation');
      const err = thrown(() =>
        organizer.insertAt(LAYOUT, { type: 'SUBTABLE', code: 't' }, { after: 'orders' }),
      );
      expect(err.message).toBe('A GROUP cannot contain a SUBTABLE (group "info")');
    });

    it('rejects unknown targets and malformed positions', () => {
      expect(thrown(() => organizer.insertAt(LAYOUT, amount, { after: 'missing' })).message).toBe(
        'No element with code "missing" exists in the layout',
      );
      expect(thrown(() => organizer.insertAt(LAYOUT, newRow, { index: -1 })).kind).toBe(
        'LayoutPositionInvalid',
      );
    });
  });

  describe('readFieldMap', () => {
    it('keys fields by code', () => {
      const map = organizer.readFieldMap([{ type: 'NUMBER', code: 'n', label: 'N' }]);
      expect(map).toEqual({ n: { type: 'NUMBER', code: 'n', label: 'N' } });
    });

    it('rejects entries that are not fields', () => {
      const err = thrown(() => organizer.readFieldMap({ n: { type: 'NUMBER' } }));
      expect(err.kind).toBe('FieldConfigInvalid');
      expect(err.path).toBe('fields.n');
    });
  });
});
