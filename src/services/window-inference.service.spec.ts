import { Test, TestingModule } from '@nestjs/testing';
import { WindowInferenceService } from './window-inference.service';
import { EmptyInputError } from '../errors';

describe('WindowInferenceService', () => {
  let service: WindowInferenceService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [WindowInferenceService],
    }).compile();

    service = module.get<WindowInferenceService>(WindowInferenceService);
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  it('should span the calendar month of the earliest created_at', () => {
    const window = service.infer([
      { transactionId: 'b', createdAt: '2024-03-29 10:00:00' },
      { transactionId: 'a', createdAt: '2024-03-17' },
      { transactionId: 'c', createdAt: '2024-04-02 08:00:00' },
    ]);

    expect(window.windowStart.toISOString()).toBe('2024-03-01T00:00:00.000Z');
    expect(window.windowEnd.toISOString()).toBe('2024-04-01T00:00:00.000Z');
  });

  it('should ignore missing and malformed created_at values', () => {
    const window = service.infer([
      { transactionId: 'a', createdAt: null },
      { transactionId: 'b', createdAt: 'last tuesday' },
      { transactionId: 'c' },
      { transactionId: 'd', createdAt: '2026-01-09 12:00:00' },
    ]);

    expect(window.windowStart.toISOString()).toBe('2026-01-01T00:00:00.000Z');
    expect(window.windowEnd.toISOString()).toBe('2026-02-01T00:00:00.000Z');
  });

  it('should truncate in UTC after applying offsets', () => {
    // 2024-03-31T23:00:00Z
    const window = service.infer([{ createdAt: '2024-04-01T01:00:00+02:00' }]);

    expect(window.windowStart.toISOString()).toBe('2024-03-01T00:00:00.000Z');
  });

  it('should accept Date values', () => {
    const window = service.infer([{ createdAt: new Date(Date.UTC(2025, 11, 31, 23, 0)) }]);

    expect(window.windowStart.toISOString()).toBe('2025-12-01T00:00:00.000Z');
    expect(window.windowEnd.toISOString()).toBe('2026-01-01T00:00:00.000Z');
  });

  it('should throw EmptyInputError when there are no transactions', () => {
    expect(() => service.infer([])).toThrow(EmptyInputError);
  });

  it('should throw EmptyInputError when no created_at is usable', () => {
    expect(() =>
      service.infer([{ createdAt: null }, { createdAt: '' }, { createdAt: 'n/a' }]),
    ).toThrow('no transaction has a usable created_at');
  });
});
