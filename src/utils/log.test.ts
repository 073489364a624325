import { describe, it, expect, vi, beforeEach } from 'vitest';
import fs from 'fs';
import cliProgress from 'cli-progress';
import { logToFile, initProgressBar, incrementProgressBar, stopProgressBar } from './log';

// Mock dependencies
vi.mock('fs');
vi.mock('cli-progress');

describe('Log Utilities', () => {
  let mockWriteStream: {
    write: ReturnType<typeof vi.fn>;
    end: ReturnType<typeof vi.fn>;
  };
  let mockProgressBar: {
    start: ReturnType<typeof vi.fn>;
    increment: ReturnType<typeof vi.fn>;
    stop: ReturnType<typeof vi.fn>;
  };

  beforeEach(() => {
    vi.clearAllMocks();
    stopProgressBar();
    vi.clearAllMocks();

    mockWriteStream = {
      write: vi.fn(),
      end: vi.fn(),
    };
    vi.mocked(fs.createWriteStream).mockReturnValue(mockWriteStream as unknown as fs.WriteStream);

    mockProgressBar = {
      start: vi.fn(),
      increment: vi.fn(),
      stop: vi.fn(),
    };
    vi.mocked(cliProgress.SingleBar).mockImplementation(
      () => mockProgressBar as unknown as cliProgress.SingleBar,
    );
  });

  describe('logToFile', () => {
    it('should append to the log file by default', () => {
      logToFile('/var/log/budget.log', 'Request failed');

      expect(fs.createWriteStream).toHaveBeenCalledWith('/var/log/budget.log', { flags: 'a' });
      expect(mockWriteStream.write).toHaveBeenCalledWith('Request failed\n');
      expect(mockWriteStream.end).toHaveBeenCalled();
    });

    it('should overwrite the log file when reset is true', () => {
      logToFile('/var/log/budget.log', 'Fresh start', true);

      expect(fs.createWriteStream).toHaveBeenCalledWith('/var/log/budget.log', { flags: 'w' });
      expect(mockWriteStream.write).toHaveBeenCalledWith('Fresh start\n');
    });

    it('should handle empty message', () => {
      logToFile('/var/log/budget.log', '');

      expect(mockWriteStream.write).toHaveBeenCalledWith('\n');
      expect(mockWriteStream.end).toHaveBeenCalled();
    });
  });

  describe('initProgressBar', () => {
    it('should create a bar labelled with the batch name', () => {
      initProgressBar(12, '2025-04');

      expect(cliProgress.SingleBar).toHaveBeenCalledWith({
        format: 'Progress |{bar}| {percentage}% | {value} / {total} | 2025-04',
        barCompleteChar: '█',
        barIncompleteChar: '░',
      });
      expect(mockProgressBar.start).toHaveBeenCalledWith(12, 0);
    });
  });

  describe('incrementProgressBar', () => {
    it('should increment an active bar', () => {
      initProgressBar(3, '2025-04');
      incrementProgressBar();
      incrementProgressBar();

      expect(mockProgressBar.increment).toHaveBeenCalledTimes(2);
    });

    it('should do nothing without an active bar', () => {
      expect(() => incrementProgressBar()).not.toThrow();
      expect(mockProgressBar.increment).not.toHaveBeenCalled();
    });
  });

  describe('stopProgressBar', () => {
    it('should stop the bar and release it', () => {
      initProgressBar(3, '2025-04');
      stopProgressBar();
      incrementProgressBar();

      expect(mockProgressBar.stop).toHaveBeenCalledTimes(1);
      expect(mockProgressBar.increment).not.toHaveBeenCalled();
    });
  });
});
