import { describe, it } from 'mocha';
import { expect } from 'chai';
import {
  DecodeError, EdrError, getCodeForError, MalformedWktError, SavedQueryError, SchemaError,
  ServiceResponseError, TemporalOutOfRangeError, UnknownParameterError,
} from '../../app/util/errors';

describe('util/errors', function () {
  describe('query validation errors', function () {
    const error = new UnknownParameterError('Collection metar has no parameter humidity', 'parameters[1]');

    it('carries the kind of the failed rule', function () {
      expect(error.kind).to.equal('UnknownParameter');
    });

    it('names the offending field', function () {
      expect(error.field).to.equal('parameters[1]');
    });

    it('is an EdrError named after its class', function () {
      expect(error).to.be.an.instanceOf(EdrError);
      expect(error.name).to.equal('UnknownParameterError');
    });
  });

  describe('SchemaError', function () {
    it('prefixes the message with the document path', function () {
      expect(new SchemaError('bbox must be an array of 4 or 6 numbers', 'collections[0].extent.spatial.bbox').message)
        .to.equal('collections[0].extent.spatial.bbox: bbox must be an array of 4 or 6 numbers');
    });
  });

  describe('MalformedWktError', function () {
    it('appends the position to the message', function () {
      const error = new MalformedWktError('token', "'x' is not a number", 12);
      expect(error.message).to.equal("'x' is not a number (at position 12)");
      expect(error.position).to.equal(12);
      expect(error.reason).to.equal('token');
    });
  });

  describe('ServiceResponseError', function () {
    it('uses a default message with the status code', function () {
      const error = new ServiceResponseError(503, 'https://edr.example.com/collections');
      expect(error.message).to.equal('EDR service responded with HTTP 503');
      expect(error.code).to.equal(503);
      expect(error.url).to.equal('https://edr.example.com/collections');
    });
  });

  describe('#getCodeForError', function () {
    it('returns the kind for query validation errors', function () {
      expect(getCodeForError(new TemporalOutOfRangeError('out of range', 'temporal'))).to.equal('edr.TemporalOutOfRange');
    });

    it('returns the kind for decode errors', function () {
      expect(getCodeForError(new DecodeError('RangeShapeMismatch', 'bad shape'))).to.equal('edr.RangeShapeMismatch');
    });

    it('returns the class name for other query kit errors', function () {
      expect(getCodeForError(new SavedQueryError('unreadable'))).to.equal('edr.SavedQueryError');
    });

    it('returns a generic code for any other error', function () {
      expect(getCodeForError(new Error('boom'))).to.equal('edr.UnknownError');
    });
  });
});
