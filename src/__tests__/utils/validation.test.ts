import {
  ValidationError,
  validateDirectory,
  validateExitCode,
  validateFileAction,
  validateJson,
  validateKnowledgeCategory,
  validateEntityType,
  validateLineCount,
  validatePositiveInteger,
  validateRequired,
  validateToolName,
  validateUnitInterval,
} from '../../utils/validation';

describe('Validation Utils', () => {
  describe('validateRequired', () => {
    it('should trim valid strings', () => {
      expect(validateRequired('  hello  ', 'Title')).toBe('hello');
    });

    it('should reject empty strings', () => {
      expect(() => validateRequired('   ', 'Title')).toThrow(ValidationError);
      expect(() => validateRequired('   ', 'Title')).toThrow('Title cannot be empty');
    });

    it('should reject non-strings', () => {
      expect(() => validateRequired(5, 'Title')).toThrow('Title must be a non-empty string');
      expect(() => validateRequired(undefined, 'Title')).toThrow('Title must be a non-empty string');
    });

    it('should enforce the maximum length', () => {
      expect(() => validateRequired('abcdef', 'Title', 5)).toThrow('Title too long (max 5 characters)');
    });

    it('should reject null bytes', () => {
      expect(() => validateRequired('a\0b', 'Title')).toThrow('Title contains invalid characters');
    });
  });

  describe('validateToolName', () => {
    it('should keep the tool name as given', () => {
      expect(validateToolName('toolA')).toBe('toolA');
      expect(validateToolName('gemini-cli_2.0')).toBe('gemini-cli_2.0');
    });

    it('should reject names with spaces or slashes', () => {
      expect(() => validateToolName('my tool')).toThrow(ValidationError);
      expect(() => validateToolName('../bin')).toThrow(ValidationError);
    });
  });

  describe('validateDirectory', () => {
    it('should strip trailing separators', () => {
      expect(validateDirectory('/p/')).toBe('/p');
      expect(validateDirectory('/work/app//')).toBe('/work/app');
    });

    it('should keep the root directory', () => {
      expect(validateDirectory('/')).toBe('/');
    });

    it('should reject an empty directory', () => {
      expect(() => validateDirectory('')).toThrow('Working directory cannot be empty');
    });
  });

  describe('validateFileAction', () => {
    it('should accept known actions', () => {
      expect(validateFileAction('created')).toBe('created');
      expect(validateFileAction('read')).toBe('read');
    });

    it('should reject unknown actions', () => {
      expect(() => validateFileAction('renamed')).toThrow(
        'Invalid file action. Must be one of: created, modified, deleted, read'
      );
    });
  });

  describe('validateLineCount', () => {
    it('should default to zero', () => {
      expect(validateLineCount(undefined, 'Lines added')).toBe(0);
      expect(validateLineCount(null, 'Lines added')).toBe(0);
    });

    it('should reject negative counts', () => {
      expect(() => validateLineCount(-1, 'Lines added')).toThrow('Lines added cannot be negative');
    });

    it('should reject fractional counts', () => {
      expect(() => validateLineCount(1.5, 'Lines removed')).toThrow(
        'Lines removed must be an integer'
      );
    });
  });

  describe('validateExitCode', () => {
    it('should map a missing exit code to null', () => {
      expect(validateExitCode(undefined)).toBeNull();
      expect(validateExitCode(0)).toBe(0);
      expect(validateExitCode(-1)).toBe(-1);
    });

    it('should reject non-integers', () => {
      expect(() => validateExitCode('0')).toThrow('Exit code must be an integer');
    });
  });

  describe('enumerations', () => {
    it('should validate knowledge categories', () => {
      expect(validateKnowledgeCategory('gotcha')).toBe('gotcha');
      expect(() => validateKnowledgeCategory('tip')).toThrow(
        'Invalid category. Must be one of: pattern, solution, gotcha, preference'
      );
    });

    it('should validate entity types', () => {
      expect(validateEntityType('technology')).toBe('technology');
      expect(() => validateEntityType('place')).toThrow(ValidationError);
    });
  });

  describe('numbers', () => {
    it('should accept the bounds of the unit interval', () => {
      expect(validateUnitInterval(0, 'Confidence')).toBe(0);
      expect(validateUnitInterval(1, 'Confidence')).toBe(1);
    });

    it('should reject values outside the unit interval', () => {
      expect(() => validateUnitInterval(1.2, 'Confidence')).toThrow(
        'Confidence must be between 0 and 1'
      );
      expect(() => validateUnitInterval('0.5', 'Confidence')).toThrow('Confidence must be a number');
    });

    it('should require positive integers', () => {
      expect(validatePositiveInteger(3, 'Limit')).toBe(3);
      expect(() => validatePositiveInteger(0, 'Limit')).toThrow('Limit must be a positive integer');
    });
  });

  describe('validateJson', () => {
    it('should pass JSON data through', () => {
      expect(validateJson({ a: [1, 'x', null, true] }, 'data')).toEqual({ a: [1, 'x', null, true] });
    });

    it('should reject values JSON cannot represent', () => {
      expect(() => validateJson(undefined, 'data')).toThrow('data must be JSON data');
      expect(() => validateJson({ f: () => 1 }, 'data')).toThrow('data.f must be JSON data');
      expect(() => validateJson([Number.NaN], 'data')).toThrow('data[0] must be finite');
    });
  });
});
