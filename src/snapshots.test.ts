/**
 * Snapshot Rule Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { LAST, POST, PRE } from './types.js';
import { textState, withContent } from './content.js';
import {
  defaultSnapshotName,
  isMovingSnapshot,
  isSealed,
  isStillMoving,
  resolveCompiledContent,
} from './snapshots.js';

describe('snapshot rules', () => {
  it('should treat pre, post and last as moving', () => {
    assert.deepEqual(
      [PRE, POST, LAST, 'raw'].map(isMovingSnapshot),
      [true, true, true, false]
    );
  });

  it('should default to pre only when it holds content', () => {
    const state = textState('last');

    assert.equal(defaultSnapshotName(state), LAST);
    assert.equal(defaultSnapshotName(withContent(state, PRE, 'pre')), PRE);
  });

  it('should only look at the first declaration of a name', () => {
    assert.equal(isSealed([{ name: 'raw', final: true }, { name: 'raw', final: false }], 'raw'), true);
    assert.equal(isSealed([{ name: 'raw', final: false }, { name: 'raw', final: true }], 'raw'), false);
    assert.equal(isSealed([], 'raw'), false);
  });

  it('should keep pre moving until sealed', () => {
    assert.equal(isStillMoving([], PRE), true);
    assert.equal(isStillMoving([{ name: PRE, final: true }], PRE), false);
    assert.equal(isStillMoving([{ name: PRE, final: true }], POST), true);
    assert.equal(isStillMoving([{ name: PRE, final: true }], LAST), true);
    assert.equal(isStillMoving([], 'raw'), false);
  });
});

describe('resolveCompiledContent', () => {
  // Sealed pre, then content changed again afterwards
  const state = withContent(withContent(textState('after'), PRE, 'before'), POST, 'after');

  it('should hand out sealed pre before compilation ends', () => {
    assert.deepEqual(
      resolveCompiledContent({ rep: '/a/ (default)', state, snapshots: [{ name: PRE, final: true }], compiled: false }),
      { success: true, content: 'before' }
    );
  });

  it('should hold back pre that was never sealed', () => {
    assert.deepEqual(resolveCompiledContent({ rep: '/a/ (default)', state, snapshots: [], compiled: false }), {
      success: false,
      error: { code: 'UNMET_DEPENDENCY', rep: '/a/ (default)' },
    });
  });

  it('should hand out anything once compiled', () => {
    assert.deepEqual(
      resolveCompiledContent({ rep: '/a/ (default)', state, snapshots: [], compiled: true, snapshot: POST }),
      { success: true, content: 'after' }
    );
  });

  it('should check fixed names before content', () => {
    assert.deepEqual(
      resolveCompiledContent({ rep: '/a/ (default)', state, snapshots: [], compiled: true, snapshot: 'raw' }),
      { success: false, error: { code: 'NO_SUCH_SNAPSHOT', rep: '/a/ (default)', snapshot: 'raw' } }
    );
  });
});
