import { createApp } from '../../../src/lifecycle-api/app';
import { LifecycleTracker } from '@core/tracker';

export function makeApp() {
  let next = 0;
  const tracker = new LifecycleTracker({
    clock: () => new Date('2026-01-15T00:00:00.000Z'),
    idGenerator: () => `item-${++next}`,
  });
  const app = createApp({ tracker, logRequests: false });
  return { app, tracker };
}
