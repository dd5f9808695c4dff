import { describe, it, expect } from 'vitest';
import { extractManualBody, manualBodyFromLines, resolveManualBody } from './manual-section.js';
import type { ManualSectionSpec } from '../config/agent-profiles.js';

const SECTION: ManualSectionSpec = {
  header: '## Manual Guidance',
  startMarker: '<!-- manual:start -->',
  endMarker: '<!-- manual:end -->',
  defaultLines: ['- default reminder'],
};

describe('extractManualBody', () => {
  it('should return the exact text between the markers', () => {
    const doc = 'intro\n<!-- manual:start -->\n  keep   this\t\n\n- and this\n<!-- manual:end -->\ntrailer';
    expect(extractManualBody(doc, SECTION)).toBe('\n  keep   this\t\n\n- and this\n');
  });

  it('should return null without an end marker after the start', () => {
    expect(extractManualBody('<!-- manual:end --> <!-- manual:start -->', SECTION)).toBeNull();
  });
});

describe('resolveManualBody', () => {
  it('should use default lines for a missing document', () => {
    expect(resolveManualBody(null, SECTION, 'Guide')).toBe('\n\n- default reminder\n\n');
  });

  it('should reuse an existing block byte for byte', () => {
    const doc = '# Guide\n<!-- manual:start -->odd\r\nspacing<!-- manual:end -->\n';
    expect(resolveManualBody(doc, SECTION, 'Guide')).toBe('odd\r\nspacing');
  });

  it('should adopt bullets from a hand-written document', () => {
    const doc = 'My notes\n\n- always run lint\n  - keep commits small\nplain text\n';
    expect(resolveManualBody(doc, SECTION, 'Guide')).toBe('\n\n- always run lint\n- keep commits small\n\n');
  });

  it('should not adopt bullets from a generated document', () => {
    const doc = '# Guide\n\n- generated bullet\n';
    expect(resolveManualBody(doc, SECTION, 'Guide')).toBe('\n\n- default reminder\n\n');
  });

  it('should render an empty block when there are no default lines', () => {
    expect(manualBodyFromLines([])).toBe('\n');
  });
});
