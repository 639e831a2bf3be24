import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { DataTypes } from '../../../src/datatypes/data_types.js';
import { isCompatible } from '../../../src/datatypes/compatibility.js';

describe('isCompatible', () => {
  it('数值族之间互相兼容', () => {
    assert.ok(isCompatible(DataTypes.Int8(), DataTypes.Float64()));
    assert.ok(isCompatible(DataTypes.UInt128(), DataTypes.Complex32()));
  });

  it('文本族之间互相兼容', () => {
    assert.ok(isCompatible(DataTypes.UTF8Char(), DataTypes.String()));
    assert.ok(isCompatible(DataTypes.UTF8String(), DataTypes.String()));
  });

  it('文本与数值、布尔与数值不兼容', () => {
    assert.ok(!isCompatible(DataTypes.String(), DataTypes.Int32()));
    assert.ok(!isCompatible(DataTypes.Boolean(), DataTypes.Int32()));
  });

  it('DateTime 与 Timestamp 兼容，Date 与 Time 不兼容', () => {
    assert.ok(isCompatible(DataTypes.DateTime(), DataTypes.Timestamp()));
    assert.ok(!isCompatible(DataTypes.Date(), DataTypes.Time()));
    assert.ok(isCompatible(DataTypes.Date(), DataTypes.Date()));
  });

  it('列表按元素类型兼容，列表与集合不兼容', () => {
    assert.ok(isCompatible(DataTypes.ListType(DataTypes.Int32()), DataTypes.ListType(DataTypes.Float32())));
    assert.ok(!isCompatible(DataTypes.ListType(DataTypes.Int32()), DataTypes.ListType(DataTypes.String())));
    assert.ok(!isCompatible(DataTypes.ListType(DataTypes.Int32()), DataTypes.SetType(DataTypes.Int32())));
  });

  it('映射与元组逐位置比较', () => {
    assert.ok(
      isCompatible(
        DataTypes.MapType(DataTypes.String(), DataTypes.Int8()),
        DataTypes.MapType(DataTypes.UTF8String(), DataTypes.Int64())
      )
    );
    assert.ok(
      !isCompatible(
        DataTypes.TupleType([DataTypes.Int32(), DataTypes.String()]),
        DataTypes.TupleType([DataTypes.Int32()])
      )
    );
  });

  it('具名类型按名称兼容', () => {
    assert.ok(isCompatible(DataTypes.ClassType('User'), DataTypes.ClassType('User')));
    assert.ok(!isCompatible(DataTypes.ClassType('User'), DataTypes.ClassType('Group')));
  });

  it('应该是对称的', () => {
    const pairs = [
      [DataTypes.Int32(), DataTypes.String()],
      [DataTypes.Float16(), DataTypes.UInt64()],
      [DataTypes.Timestamp(), DataTypes.DateTime()],
      [DataTypes.NoneType(), DataTypes.UndefinedType()],
    ] as const;
    for (const [a, b] of pairs) {
      assert.equal(isCompatible(a, b), isCompatible(b, a));
    }
  });
});
