import { ClassConstructor, plainToInstance } from 'class-transformer';
import { ValidationError as ConstraintViolation, validateSync } from 'class-validator';
import { ValidationError } from '../../../common/exceptions/service.exception';

export interface ConstraintFailure {
    property: string;
    constraints: Record<string, string>;
}

// Nested properties come out as dotted paths; values and targets are dropped.
function collectFailures(violations: ConstraintViolation[], parent?: string): ConstraintFailure[] {
    return violations.flatMap(violation => {
        const property = parent ? `${parent}.${violation.property}` : violation.property;
        const own = violation.constraints ? [{ property, constraints: { ...violation.constraints } }] : [];
        return [...own, ...collectFailures(violation.children ?? [], property)];
    });
}

/**
 * Builds and validates a DTO instance from a caller-supplied request.
 * Throws a ValidationError naming every violated constraint.
 */
export function validateRequest<T extends object>(dto: ClassConstructor<T>, payload: object, label: string): T {
    if (payload === null || typeof payload !== 'object') {
        throw new ValidationError(`Invalid ${label}: request is missing`);
    }

    const instance = plainToInstance(dto, payload);
    const violations = validateSync(instance, {
        forbidUnknownValues: false,
        validationError: { target: false, value: false }
    });

    if (violations.length > 0) {
        const failures = collectFailures(violations);
        const messages = failures.flatMap(failure => Object.values(failure.constraints));
        throw new ValidationError(`Invalid ${label}: ${messages.join('; ')}`, failures);
    }

    return instance;
}
