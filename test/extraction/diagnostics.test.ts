import { describe, it, expect } from 'vitest';
import { diagnosePage } from '../../src/extraction/diagnostics.js';
import { loadFixture } from '../helpers/fixture-loader.js';

describe('diagnosePage', () => {
  it('should rank classes by how often they are used', () => {
    const html = '<ul><li class="jogo destaque">a</li><li class="jogo">b</li><li class="jogo placar">c</li></ul>';

    expect(diagnosePage(html, [], 2).topClasses).toEqual([
      { name: 'jogo', count: 3 },
      { name: 'destaque', count: 1 },
    ]);
  });

  it('should quote the text around each keyword found', () => {
    const diagnostics = diagnosePage(loadFixture('ge-mineiro', 'cards.html'), ['Tombense', 'Democrata']);

    expect(Object.keys(diagnostics.contexts)).toEqual(['Tombense']);
    expect(diagnostics.contexts['Tombense']).toBe(
      '<span class="equipe equipe--visitante">Tombense</span>',
    );
  });

  it('should keep the start of the page on one line', () => {
    const diagnostics = diagnosePage('<html>\n  <body>\n<p>x</p>\n</body></html>');

    expect(diagnostics.head).toBe('<html> <body> <p>x</p> </body></html>');
    expect(diagnostics.length).toBe(39);
  });
});
