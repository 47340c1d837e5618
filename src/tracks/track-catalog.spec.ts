import { readFileSync } from 'fs';
import { join } from 'path';
import { TrackCatalog } from './track-catalog';
import {
  ConfigurationError,
  UnknownTrackError,
} from '../common/errors/checklist.errors';

const fixture = JSON.parse(
  readFileSync(join(__dirname, '../../test/fixtures/tracks.json'), 'utf-8'),
) as unknown;

const shipped = JSON.parse(
  readFileSync(join(__dirname, '../../config/tracks.json'), 'utf-8'),
) as unknown;

describe('TrackCatalog', () => {
  let catalog: TrackCatalog;

  beforeEach(() => {
    catalog = TrackCatalog.fromConfig(fixture);
  });

  it('should list tracks in file order', () => {
    expect(catalog.list()).toEqual([
      { id: 'cyber-security-track', label: 'Cyber Security', description: undefined },
      { id: 'evening-track', label: 'Evening classes', description: undefined },
    ]);
  });

  it('should return requirements in file order', () => {
    const types = catalog.getRequirements('cyber-security-track').map((r) => r.documentType);
    expect(types).toEqual(['id_card', 'transcript', 'name_change_evidence']);
  });

  it('should return the same list on every call', () => {
    const first = catalog.getRequirements('cyber-security-track');
    const second = catalog.getRequirements('cyber-security-track');
    expect(second).toBe(first);
  });

  it('should return non-empty requirements for every track', () => {
    for (const track of catalog.list()) {
      expect(catalog.getRequirements(track.id).length).toBeGreaterThan(0);
    }
  });

  it('should freeze requirements', () => {
    const [idCard] = catalog.getRequirements('cyber-security-track');
    expect(Object.isFrozen(idCard)).toBe(true);
    expect(Object.isFrozen(idCard.acceptedFormats)).toBe(true);
  });

  it('should throw ConfigurationError for unknown track', () => {
    expect(() => catalog.getRequirements('pastry-track')).toThrow(UnknownTrackError);
    expect(() => catalog.getRequirements('pastry-track')).toThrow(ConfigurationError);
  });

  it('should load the shipped catalog', () => {
    const real = TrackCatalog.fromConfig(shipped);
    expect(real.list().map((t) => t.id)).toEqual([
      'no-cyber-security',
      'cyber-security-weekday',
      'cyber-security-weekend',
    ]);
    const required = real
      .getRequirements('cyber-security-weekday')
      .filter((r) => r.required)
      .map((r) => r.documentType);
    expect(required).toEqual(['photo', 'id_card', 'transcript']);
  });

  describe('invalid configuration', () => {
    const requirement = {
      documentType: 'id_card',
      displayLabel: 'ID card',
      required: true,
      acceptedFormats: ['pdf'],
      maxSizeBytes: 1024,
    };

    it('should reject a non-object', () => {
      expect(() => TrackCatalog.fromConfig([])).toThrow(ConfigurationError);
    });

    it('should reject an empty track list', () => {
      expect(() => TrackCatalog.fromConfig({ tracks: [] })).toThrow(ConfigurationError);
    });

    it('should reject a track without requirements', () => {
      expect(() =>
        TrackCatalog.fromConfig({ tracks: [{ id: 'a', label: 'A', requirements: [] }] }),
      ).toThrow(ConfigurationError);
    });

    it('should report the offending property path', () => {
      const config = {
        tracks: [
          {
            id: 'a',
            label: 'A',
            requirements: [{ ...requirement, acceptedFormats: ['.PDF'] }],
          },
        ],
      };
      expect(() => TrackCatalog.fromConfig(config)).toThrow(
        'Invalid track catalog: tracks.0.requirements.0.acceptedFormats: acceptedFormats must be lower-case extensions without dot',
      );
    });

    it('should reject a non-positive size limit', () => {
      const config = {
        tracks: [{ id: 'a', label: 'A', requirements: [{ ...requirement, maxSizeBytes: 0 }] }],
      };
      expect(() => TrackCatalog.fromConfig(config)).toThrow(ConfigurationError);
    });

    it('should reject a size limit above the upload limit', () => {
      const config = {
        tracks: [
          {
            id: 'a',
            label: 'A',
            requirements: [{ ...requirement, maxSizeBytes: 300 * 1024 * 1024 }],
          },
        ],
      };
      expect(() => TrackCatalog.fromConfig(config)).toThrow(
        'Invalid track catalog: tracks.0.requirements.0.maxSizeBytes: maxSizeBytes must not exceed the upload limit of 262144000 bytes',
      );
    });

    it('should reject duplicate track ids', () => {
      const track = { id: 'a', label: 'A', requirements: [requirement] };
      expect(() => TrackCatalog.fromConfig({ tracks: [track, track] })).toThrow(
        'Duplicate track id: a',
      );
    });

    it('should reject duplicate document types in a track', () => {
      const config = {
        tracks: [{ id: 'a', label: 'A', requirements: [requirement, requirement] }],
      };
      expect(() => TrackCatalog.fromConfig(config)).toThrow(
        'Duplicate document type id_card in track a',
      );
    });

    it('should reject unknown properties', () => {
      const config = {
        tracks: [
          { id: 'a', label: 'A', requirements: [{ ...requirement, maxSizeMb: 5 }] },
        ],
      };
      expect(() => TrackCatalog.fromConfig(config)).toThrow(ConfigurationError);
    });
  });
});
