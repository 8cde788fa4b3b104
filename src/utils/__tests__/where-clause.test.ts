/**
 * Unit tests for WHERE / ORDER BY fragment validation
 */

import { describe, it, expect } from 'vitest';
import {
    validateFragment,
    validateWhereClause,
    shiftPlaceholders,
    UnsafeFragmentError
} from '../where-clause.js';

describe('validateWhereClause', () => {
    it('should accept ordinary predicates', () => {
        expect(() => validateWhereClause('id = $1')).not.toThrow();
        expect(() => validateWhereClause("status IN ('a', 'b') AND age > $2")).not.toThrow();
        expect(() => validateWhereClause('name ILIKE $1')).not.toThrow();
    });

    it('should reject stacked statements', () => {
        expect(() => validateWhereClause('1=1; DROP TABLE users')).toThrow(
            'Unsafe WHERE clause: contains statement terminator followed by dangerous keyword'
        );
    });

    it('should reject a trailing semicolon', () => {
        expect(() => validateWhereClause('id = 1;')).toThrow('Unsafe WHERE clause: contains trailing semicolon');
    });

    it('should reject comments', () => {
        expect(() => validateWhereClause('id = 1 -- x')).toThrow(UnsafeFragmentError);
        expect(() => validateWhereClause('id = 1 /* x */')).toThrow(UnsafeFragmentError);
    });

    it('should reject UNION SELECT', () => {
        expect(() => validateWhereClause('1=0 UNION ALL SELECT password FROM users')).toThrow(
            'Unsafe WHERE clause: contains UNION SELECT'
        );
    });

    it('should reject server-side file and sleep functions', () => {
        expect(() => validateWhereClause('pg_sleep(5) IS NULL')).toThrow(UnsafeFragmentError);
        expect(() => validateWhereClause("pg_read_file('/etc/passwd') <> ''")).toThrow(UnsafeFragmentError);
    });

    it('should reject blank clauses', () => {
        expect(() => validateWhereClause('  ')).toThrow('Unsafe WHERE clause: clause must be a non-empty string');
    });
});

describe('validateFragment', () => {
    it('should name the fragment kind in the error', () => {
        expect(() => validateFragment('id; DELETE FROM users', 'ORDER BY')).toThrow(/^Unsafe ORDER BY clause/);
    });

    it('should accept ordering expressions', () => {
        expect(() => validateFragment('created_at DESC, id', 'ORDER BY')).not.toThrow();
    });
});

describe('shiftPlaceholders', () => {
    it('should renumber every placeholder by the offset', () => {
        expect(shiftPlaceholders('id = $1 AND org = $2', 3)).toBe('id = $4 AND org = $5');
    });

    it('should handle multi-digit placeholders', () => {
        expect(shiftPlaceholders('a = $10', 2)).toBe('a = $12');
    });

    it('should leave the fragment alone with a zero offset', () => {
        expect(shiftPlaceholders('id = $1', 0)).toBe('id = $1');
    });

    it('should skip dollar signs inside string literals', () => {
        expect(shiftPlaceholders("label = 'US$5' AND id = $1", 1)).toBe("label = 'US$5' AND id = $2");
    });

    it('should honour doubled quotes inside a literal', () => {
        expect(shiftPlaceholders("name = 'it''s $1' AND id = $1", 1)).toBe("name = 'it''s $1' AND id = $2");
    });

    it('should skip dollar-quoted bodies', () => {
        expect(shiftPlaceholders('note = $$cost $1$$ AND id = $1', 2)).toBe('note = $$cost $1$$ AND id = $3');
        expect(shiftPlaceholders('body = $t$ $2 $t$ AND id = $1', 2)).toBe('body = $t$ $2 $t$ AND id = $3');
    });

    it('should skip quoted identifiers', () => {
        expect(shiftPlaceholders('"price$1" > $1', 4)).toBe('"price$1" > $5');
    });
});
