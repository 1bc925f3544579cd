import test from 'ava';

import { isDebugEnabled } from '../core/logger.js';

test('isDebugEnabled honours the DEBUG namespace list', (t) => {
  t.true(isDebugEnabled({ DEBUG: 'okta-origin-report' }));
  t.true(isDebugEnabled({ DEBUG: 'express, okta-origin-report' }));
  t.true(isDebugEnabled({ DEBUG: '*' }));
  t.false(isDebugEnabled({ DEBUG: 'express' }));
  t.false(isDebugEnabled({}));
});
