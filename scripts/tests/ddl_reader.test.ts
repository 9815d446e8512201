import assert from 'node:assert/strict';
import test from 'node:test';

import { firstValue, readDdl } from '../lib/metadata/ddl_reader.js';

test('readDdl reads blocks, save frames, loops and text fields', () => {
  const [block] = readDdl(`
data_demo
    _dictionary.title   demo  # trailing comment
    loop_
    _item_type_list.code
    _item_type_list.primitive_code
      code  char
      int   numb

save_thing
    _category.id        thing
    _category.description
;   First line
    second line
;
save_
`);

  assert.equal(block.name, 'demo');
  assert.equal(firstValue(block.values, 'dictionary.title'), 'demo');
  assert.deepEqual(block.values.get('item_type_list.code'), ['code', 'int']);
  assert.deepEqual(block.values.get('item_type_list.primitive_code'), ['char', 'numb']);
  assert.equal(block.frames.length, 1);
  assert.equal(block.frames[0].name, 'thing');
  assert.equal(
    firstValue(block.frames[0].values, 'category.description'),
    'First line\n    second line'
  );
});

test('readDdl keeps quoted values whole and lowercases tag names', () => {
  const [block] = readDdl(`
data_q
    _Item.Name   '_entity.id'
    _item.note   "it's quoted"
    _item.other  'a'b'
`);

  assert.deepEqual(block.values.get('item.name'), ['_entity.id']);
  assert.equal(firstValue(block.values, 'item.note'), "it's quoted");
  assert.equal(firstValue(block.values, 'item.other'), "a'b");
});

test('readDdl rejects loops whose values do not fill every column', () => {
  assert.throws(
    () =>
      readDdl(`
data_bad
loop_
_a.x
_a.y
  1 2 3
`),
    /loop of 2 tags has 3 values/
  );
});

test('readDdl rejects unterminated text fields and tags without values', () => {
  assert.throws(() => readDdl('data_x\n_a.b\n;open\nnever closed\n'), /Unterminated text field/);
  assert.throws(() => readDdl('data_x\n_a.b\n_a.c 1\n'), /tag '_a.b' has no value/);
});

test('readDdl rejects content before the first data block', () => {
  assert.throws(() => readDdl('_a.b value\n'), /appears before any data_ block/);
});
