import {Either, Left, NonEmptyList, Right} from 'purify-ts';

/**
 * Turns a list of configuration issues into a Left, or builds the value when
 * there are none. Every issue is reported, not just the first.
 */
export function validated<T>(
    issues: string[],
    build: () => T
): Either<NonEmptyList<string>, T> {
    return NonEmptyList.fromArray(issues).caseOf<Either<NonEmptyList<string>, T>>({
        Just: (list) => Left(list),
        Nothing: () => Right(build()),
    });
}

export function nameIssues(name: string): string[] {
    return name.length === 0 ? ["argument 'name' cannot be an empty string."] : [];
}
