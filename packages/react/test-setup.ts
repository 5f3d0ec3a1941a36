/**
 * Unmounts rendered trees between tests; globals are off, so
 * @testing-library/react does not register this itself.
 */

import { afterEach } from 'vitest';
import { cleanup } from '@testing-library/react';

afterEach(() => {
  cleanup();
});
