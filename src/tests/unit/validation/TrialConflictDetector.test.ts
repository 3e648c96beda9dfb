import { RegistrationBuilder } from '../../../services/routing/RegistrationBuilder';
import { TrialConflictDetector } from '../../../services/validation/TrialConflictDetector';
import { TrialConflictError } from '../../../types/ExperimentErrors';

describe('TrialConflictDetector', () => {
  const detector = new TrialConflictDetector();

  function search(name?: string): RegistrationBuilder<string> {
    const builder = RegistrationBuilder.for<string>('ISearchService')
      .addControl('baseline', () => 'keyword')
      .addTrial('semantic', () => 'semantic');
    return name ? builder.named(name) : builder;
  }

  const jan = new Date('2025-01-01T00:00:00.000Z');
  const feb = new Date('2025-02-01T00:00:00.000Z');
  const mar = new Date('2025-03-01T00:00:00.000Z');

  it('should find nothing in a single valid registration', () => {
    expect(detector.detectConflicts([search().onErrorRedirectDefault().build()])).toEqual([]);
  });

  it('should report one conflict for two overlapping time windows', () => {
    const conflicts = detector.detectConflicts([
      search('winter').activeDuring(jan, mar).build(),
      search('spring').activeFrom(feb).build(),
    ]);

    expect(conflicts).toEqual([
      {
        type: 'OverlappingTimeWindows',
        serviceType: 'ISearchService',
        description:
          "Registrations for ISearchService have overlapping time windows: 'winter' [2025-01-01T00:00:00.000Z to " +
          "2025-03-01T00:00:00.000Z] and 'spring' [2025-02-01T00:00:00.000Z to unbounded].",
        experimentNames: ['winter', 'spring'],
      },
    ]);
  });

  it('should accept windows that only touch', () => {
    const conflicts = detector.detectConflicts([
      search('january').activeDuring(jan, feb).build(),
      search('february').activeDuring(feb, mar).build(),
    ]);

    expect(conflicts).toEqual([]);
  });

  it('should not compare registrations of different service types', () => {
    const other = RegistrationBuilder.for<string>('IGreeter').addControl('formal', () => 'formal').build();

    expect(detector.detectConflicts([search().build(), other])).toEqual([]);
  });

  it('should report duplicate unbounded registrations once', () => {
    const conflicts = detector.detectConflicts([search('a').build(), search('b').build(), search('c').build()]);

    expect(conflicts).toEqual([
      {
        type: 'DuplicateServiceRegistration',
        serviceType: 'ISearchService',
        description: 'Multiple registrations for ISearchService without time bounds to differentiate them.',
        experimentNames: ['a', 'b', 'c'],
      },
    ]);
  });

  it('should report every fallback key that is not a trial', () => {
    const conflicts = detector.detectConflicts([
      search('ordered')
        .onErrorTryInOrder('hybrid', 'baseline', 'vector')
        .withTimeout(100, 'FallbackToSpecificTrial', 'cached')
        .withCircuitBreaker({ onCircuitOpen: 'FallbackToSpecificTrial', fallbackTrialKey: 'static' })
        .build(),
    ]);

    expect(conflicts.map((c) => c.description)).toEqual([
      "Registration for ISearchService references ordered fallback key 'hybrid' which is not a registered trial.",
      "Registration for ISearchService references ordered fallback key 'vector' which is not a registered trial.",
      "Registration for ISearchService references timeout fallback key 'cached' which is not a registered trial.",
      "Registration for ISearchService references circuit breaker fallback key 'static' which is not a registered trial.",
    ]);
    expect(conflicts.every((c) => c.type === 'InvalidFallbackKey')).toBe(true);
    expect(conflicts[0].experimentNames).toEqual(['ordered']);
  });

  it('should report an unknown redirect target', () => {
    const conflicts = detector.detectConflicts([search().onErrorRedirectTo('hybrid').build()]);

    expect(conflicts).toEqual([
      {
        type: 'InvalidFallbackKey',
        serviceType: 'ISearchService',
        description: "Registration for ISearchService references fallback key 'hybrid' which is not a registered trial.",
        experimentNames: undefined,
      },
    ]);
  });

  it('should throw with every conflict listed', () => {
    const registrations = [search('a').onErrorRedirectTo('hybrid').build(), search('b').build()];

    expect(() => detector.validateOrThrow(registrations)).toThrow(TrialConflictError);
    expect(() => detector.validateOrThrow(registrations)).toThrow(
      'Detected 2 trial conflict(s):\n' +
        '  - [DuplicateServiceRegistration] Multiple registrations for ISearchService without time bounds to differentiate them.\n' +
        "  - [InvalidFallbackKey] Registration for ISearchService references fallback key 'hybrid' which is not a registered trial."
    );
  });

  it('should not throw for a valid set', () => {
    expect(() => detector.validateOrThrow([search().build()])).not.toThrow();
  });
});
