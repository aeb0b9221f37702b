// CHANGE: Bridge from the pure Either API to Effect pipelines
// PURITY: CORE
// INVARIANT: toEffect(right(a)) succeeds with a; toEffect(left(e)) fails with e
// COMPLEXITY: O(1)

import { Effect, Either } from "effect";

/**
 * Lifts an Either into an Effect that succeeds or fails accordingly.
 *
 * @pure true
 * @complexity O(1)
 */
export const toEffect = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
	Either.match(either, {
		onLeft: (error) => Effect.fail(error),
		onRight: (value) => Effect.succeed(value),
	});
