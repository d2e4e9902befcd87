import { describe, it, expect } from 'vitest';
import {
  validateArguments,
  validateProjectName,
  MAX_PROJECT_NAME_LENGTH,
} from '../materializer/validate';
import { InvalidNameError, UsageError } from '../errors';
import { catchError } from './support/fs-helpers';

describe('validateArguments', () => {
  it('should return the single name unchanged', () => {
    expect(validateArguments(['my-flask-app'])).toBe('my-flask-app');
  });

  it('should not normalize case', () => {
    expect(validateArguments(['My_App-2'])).toBe('My_App-2');
  });

  it('should throw UsageError with no arguments', () => {
    expect(() => validateArguments([])).toThrow(UsageError);
  });

  it('should throw UsageError with more than one argument', () => {
    expect(() => validateArguments(['one', 'two'])).toThrow(UsageError);
  });

  it('should show the invocation syntax in the usage message', () => {
    const error = catchError(() => validateArguments([]));

    expect(error).toBeInstanceOf(UsageError);
    expect(error).toMatchObject({
      message: 'Usage: flask-kickstart <project_name>\nExample: flask-kickstart my-flask-app',
      exitCode: 1,
    });
  });

  it('should check the count before the name', () => {
    expect(() => validateArguments(['bad name', 'other'])).toThrow(UsageError);
  });
});

describe('validateProjectName', () => {
  it.each(['a', 'app', 'my-flask-app', 'my_flask_app', 'App123', '-leading', '_private', '2024'])(
    'should accept %j',
    (name) => {
      expect(validateProjectName(name)).toBe(name);
    }
  );

  it.each(['', 'bad name', 'name!', 'naïve', 'a/b', '.', '..', 'dot.name', 'name\n', 'tab\tname', 'ünïcode'])(
    'should reject %j',
    (name) => {
      expect(() => validateProjectName(name)).toThrow(InvalidNameError);
    }
  );

  it('should carry the rejected name and a readable message', () => {
    const error = catchError(() => validateProjectName('name!'));

    expect(error).toBeInstanceOf(InvalidNameError);
    expect(error).toMatchObject({
      projectName: 'name!',
      code: 'E_INVALID_NAME',
      message: 'App name should only contain letters, numbers, hyphens, and underscores',
    });
  });

  it('should accept a name at the length limit', () => {
    const name = 'x'.repeat(MAX_PROJECT_NAME_LENGTH);
    expect(validateProjectName(name)).toBe(name);
  });

  it('should reject a name over the length limit', () => {
    expect(() => validateProjectName('x'.repeat(MAX_PROJECT_NAME_LENGTH + 1))).toThrow(
      'App name must be at most 255 characters long'
    );
  });
});
