import { describe, it } from 'mocha';
import { expect } from 'chai';
import type { QueryDescriptor } from '../../app/models/query-descriptor';
import { extensionFor, mediaType, suggestFileName } from '../../app/util/content-type';

const positionQuery: QueryDescriptor = {
  kind: 'position',
  collectionId: 'metar',
  geometry: { kind: 'position', point: [10, 50] },
  dimensions: {},
  parameters: [],
  method: 'GET',
  derivedExtents: { vertical: false, temporal: false },
};

describe('util/content-type', function () {
  describe('#mediaType', function () {
    it('drops parameters and lower cases the type', function () {
      expect(mediaType('Application/JSON; charset=utf-8')).to.equal('application/json');
    });
  });

  describe('#extensionFor', function () {
    it('returns the extension of known media types', function () {
      expect(extensionFor('application/prs.coverage+json')).to.equal('.covjson');
      expect(extensionFor('application/x-netcdf')).to.equal('.nc');
    });

    it('falls back to .json for other JSON based types', function () {
      expect(extensionFor('application/ld+json')).to.equal('.json');
    });

    it('returns undefined for unknown types', function () {
      expect(extensionFor('application/octet-stream')).to.equal(undefined);
    });
  });

  describe('#suggestFileName', function () {
    it('uses the name from a Content-Disposition header', function () {
      const response = { headers: { 'content-disposition': 'attachment; filename="metar obs.nc"' } };
      expect(suggestFileName(response, positionQuery)).to.equal('metar_obs.nc');
    });

    it('decodes extended Content-Disposition names', function () {
      const response = { headers: { 'content-disposition': "attachment; filename*=UTF-8''r%C3%A9sum%C3%A9.csv" } };
      expect(suggestFileName(response, positionQuery)).to.equal('r_sum_.csv');
    });

    it('names the file after the collection and query kind', function () {
      const response = { contentType: 'application/prs.coverage+json', headers: {} };
      expect(suggestFileName(response, positionQuery)).to.equal('metar_position.covjson');
    });

    it('uses the requested output format when the content type is unknown', function () {
      const descriptor: QueryDescriptor = {
        ...positionQuery, collectionId: 'forecast', instanceId: 'run-2024-02-01T00', outputFormat: 'NetCDF',
      };
      expect(suggestFileName({ headers: {} }, descriptor)).to.equal('forecast_run-2024-02-01T00_position.nc');
    });

    it('falls back to .dat', function () {
      const response = { contentType: 'application/octet-stream', headers: {} };
      expect(suggestFileName(response, positionQuery)).to.equal('metar_position.dat');
    });
  });
});
