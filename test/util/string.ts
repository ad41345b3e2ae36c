import { describe, it } from 'mocha';
import { expect } from 'chai';
import {
  Conjunction, isBoolean, isFloat, isInteger, isNumeric, listToText, parseBoolean, truncateString,
} from '../../app/util/string';

describe('util/string', function () {
  describe('#listToText', function () {
    it('returns an empty string when called with null', function () {
      expect(listToText(null)).to.equal('');
    });

    it('returns an empty string when receiving an empty array', function () {
      expect(listToText([])).to.equal('');
    });

    it('returns the item when receiving an array with a single item', function () {
      expect(listToText(['a'])).to.equal('a');
    });

    it('returns the items separated by " and " when receiving two items', function () {
      expect(listToText(['a', 'b'])).to.equal('a and b');
    });

    it('returns the items separated by " or " when provided "or" as the conjunction to use', function () {
      expect(listToText(['a', 'b'], Conjunction.OR)).to.equal('a or b');
    });

    it('returns the items as a textual list when receiving more than two items', function () {
      expect(listToText(['a', 'b', 'c'])).to.equal('a, b, and c');
      expect(listToText(['a', 'b', 'c', 'd'], Conjunction.OR)).to.equal('a, b, c, or d');
    });
  });

  describe('#truncateString', function () {
    it('returns the original string when it is shorter than the max', function () {
      expect(truncateString('short', 6)).to.equal('short');
    });

    it('returns the original string when it has exactly the max number of characters', function () {
      expect(truncateString('just right', 10)).to.equal('just right');
    });

    it('replaces the last three allowed characters with ... when the string is too long', function () {
      expect(truncateString('too long', 6)).to.equal('too...');
    });

    it('returns ... when the max is less than 3', function () {
      expect(truncateString('too long', 2)).to.equal('...');
    });
  });

  describe('number and boolean checks', function () {
    it('recognizes integers', function () {
      expect(isInteger('-12')).to.be.true;
      expect(isInteger('1.5')).to.be.false;
    });

    it('recognizes floats with a decimal point', function () {
      expect(isFloat('0.25')).to.be.true;
      expect(isFloat('.5')).to.be.true;
      expect(isFloat('3')).to.be.false;
    });

    it('recognizes boolean literals ignoring case', function () {
      expect(isBoolean('TRUE')).to.be.true;
      expect(isBoolean('yes')).to.be.false;
      expect(parseBoolean('True')).to.be.true;
      expect(parseBoolean('no')).to.be.false;
    });

    it('treats exponent forms as numeric and blank strings as not numeric', function () {
      expect(isNumeric('1e3')).to.be.true;
      expect(isNumeric('850.0')).to.be.true;
      expect(isNumeric(' ')).to.be.false;
      expect(isNumeric('abc')).to.be.false;
    });
  });
});
