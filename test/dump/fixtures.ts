/**
 * A small dump shared by the dump tests
 */

export const DUMP_HEAD = [
  '<mediawiki xmlns="http://www.mediawiki.org/xml/export-0.11/" version="0.11" xml:lang="fi">',
  '  <siteinfo><sitename>Testisanakirja</sitename></siteinfo>',
  '  <page>',
  '    <title>sortaa</title>',
  '    <ns>0</ns>',
  '    <id>1</id>',
  '    <revision>',
  '      <id>10</id>',
  '      <parentid>9</parentid>',
  '      <timestamp>2024-01-02T03:04:05Z</timestamp>',
  '      <contributor><username>Tester</username><id>77</id></contributor>',
  '      <model>wikitext</model>',
  '      <text bytes="40" xml:space="preserve">== Finnish ==\n# to &lt;b&gt;oppress&lt;/b&gt; &amp; more</text>',
  '    </revision>',
  '  </page>',
].join('\n');

export const DUMP_TAIL = [
  '  <page>',
  '    <title>Template:conj-table</title>',
  '    <ns>10</ns>',
  '    <id>2</id>',
  '    <redirect title="Template:new" />',
  '    <revision><id>20</id><text>#REDIRECT [[Template:new]]</text></revision>',
  '  </page>',
  '  <page>',
  '    <title>User:Tester</title>',
  '    <ns>2</ns>',
  '    <id>3</id>',
  '    <revision><id>30</id><text>hei</text></revision>',
  '  </page>',
  '  <page>',
  '    <title>Template:empty</title>',
  '    <ns>10</ns>',
  '    <id>4</id>',
  '    <revision><id>40</id><text bytes="0" /></revision>',
  '  </page>',
  '  <page>',
  '    <title>broken</title>',
  '    <ns>0</ns>',
  '    <revision><text>no id</text></revision>',
  '  </page>',
  '</mediawiki>',
].join('\n');
