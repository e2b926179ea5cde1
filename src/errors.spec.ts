import { CleanroomError, EmptyInputError, MalformedTimestampError, isCleanroomError } from './errors';

describe('errors', () => {
  it('should keep the subclass prototype', () => {
    const error = new EmptyInputError('no window');

    expect(error).toBeInstanceOf(EmptyInputError);
    expect(error).toBeInstanceOf(CleanroomError);
    expect(error).toBeInstanceOf(Error);
    expect(isCleanroomError(error)).toBe(true);
    expect(isCleanroomError(new Error('plain'))).toBe(false);
  });

  it('should serialize code, status and details', () => {
    expect(new EmptyInputError('no window', { transactions: 0 }).toJSON()).toEqual({
      name: 'EmptyInputError',
      code: 'EMPTY_INPUT',
      message: 'no window',
      statusCode: 422,
      details: { transactions: 0 },
    });
  });

  it('should carry the malformed value', () => {
    const error = new MalformedTimestampError('31/02/2024');

    expect(error.message).toBe('Malformed timestamp: "31/02/2024"');
    expect(error.statusCode).toBe(400);
    expect(error.details).toEqual({ value: '31/02/2024' });
  });
});
