/**
 * Dependency Tracker Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { NotificationCenter } from './events.js';
import { DependencyTracker } from './dependencies.js';
import { createLayout, textItem } from './site.js';

describe('DependencyTracker', () => {
  const home = textItem('/', 'home');
  const about = textItem('/about/', 'about');
  const layout = createLayout('/default/', 'wrapped');

  it('should record visits made while another subject is visited', () => {
    const events = new NotificationCenter();
    const tracker = new DependencyTracker();
    tracker.start(events);

    events.emit('visit_started', home);
    events.emit('visit_started', about);
    events.emit('visit_ended', about);
    events.emit('visit_started', layout);
    events.emit('visit_ended', layout);
    events.emit('visit_ended', home);

    assert.deepEqual(tracker.dependenciesOf(home), [about, layout]);
    assert.deepEqual(tracker.dependenciesOf(about), []);
    assert.deepEqual(tracker.toEdges(), [
      { from: '/', to: '/about/' },
      { from: '/', to: '/default/' },
    ]);
  });

  it('should attribute nested visits to the innermost subject', () => {
    const events = new NotificationCenter();
    const tracker = new DependencyTracker();
    tracker.start(events);

    events.emit('visit_started', home);
    events.emit('visit_started', about);
    events.emit('visit_started', layout);
    events.emit('visit_ended', layout);
    events.emit('visit_ended', about);
    events.emit('visit_ended', home);

    assert.deepEqual(tracker.toEdges(), [
      { from: '/', to: '/about/' },
      { from: '/about/', to: '/default/' },
    ]);
  });

  it('should ignore repeated and self visits', () => {
    const events = new NotificationCenter();
    const tracker = new DependencyTracker();
    tracker.start(events);

    events.emit('visit_started', home);
    for (let i = 0; i < 3; i++) {
      events.emit('visit_started', about);
      events.emit('visit_ended', about);
    }
    events.emit('visit_started', home);
    events.emit('visit_ended', home);
    events.emit('visit_ended', home);

    assert.deepEqual(tracker.toEdges(), [{ from: '/', to: '/about/' }]);
  });

  it('should stop listening when stopped', () => {
    const events = new NotificationCenter();
    const tracker = new DependencyTracker();
    tracker.start(events);
    tracker.stop();

    events.emit('visit_started', home);
    events.emit('visit_started', about);

    assert.deepEqual(tracker.toEdges(), []);
    assert.equal(events.listenerCount('visit_started'), 0);
  });
});
