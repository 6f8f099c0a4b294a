/**
 * Small translation documents, one per supported dialect
 */

import { ParsedDocument } from "../../bible/parsedDocument";

export const OSIS_ATTRIBUTE_XML = `<?xml version="1.0" encoding="UTF-8"?>
<osis xmlns="http://www.bibletechnologies.net/2003/OSIS/namespace">
  <osisText osisIDWork="KJV">
    <header>
      <work osisWork="KJV">
        <title>King James Version</title>
        <rights>Public Domain (Crown copyright in the UK)</rights>
      </work>
    </header>
    <div type="book" osisID="Gen">
      <chapter osisID="Gen.1">
        <verse osisID="Gen.1.3">And God said, Let there be light.</verse>
        <verse osisID="Gen.1.1">In the beginning God created the heaven and the earth.</verse>
        <verse osisID="Gen.1.2">And the earth was without form, and void.</verse>
      </chapter>
      <chapter osisID="Gen.2">
        <verse osisID="Gen.2.1">Thus the heavens and the earth were finished.</verse>
      </chapter>
    </div>
    <div type="book" osisID="John">
      <chapter osisID="John.3">
        <verse osisID="John.3.15">That whosoever believeth in him should not perish.</verse>
        <verse osisID="John.3.16">For God so loved the world.</verse>
        <verse osisID="John.3.17">For God sent not his Son into the world to condemn the world.</verse>
        <verse osisID="John.3.18">He that believeth on him is not condemned.</verse>
      </chapter>
    </div>
  </osisText>
</osis>`;

export const OSIS_MILESTONE_XML = `<?xml version="1.0" encoding="UTF-8"?>
<osis xmlns="http://www.bibletechnologies.net/2003/OSIS/namespace">
  <osisText osisIDWork="WEB">
    <header>
      <work osisWork="WEB">
        <title>World English Bible</title>
      </work>
    </header>
    <div type="book" osisID="Gen">
      <chapter sID="Gen.1" osisID="Gen.1"/>
      <verse sID="Gen.1.1" osisID="Gen.1.1"/>In the beginning, God created the heavens and the earth.<verse eID="Gen.1.1"/>
      <verse sID="Gen.1.2" osisID="Gen.1.2"/>The earth was formless and empty.<verse eID="Gen.1.2"/>
      <verse sID="Gen.1.3" osisID="Gen.1.3"/>God said, <q>Let there be light</q>, and there was light.<verse eID="Gen.1.3"/>
      <chapter eID="Gen.1"/>
      <chapter sID="Gen.2" osisID="Gen.2"/>
      <verse sID="Gen.2.1" osisID="Gen.2.1"/>The heavens, the earth, and all their vast array were finished.
      <chapter eID="Gen.2"/>
    </div>
  </osisText>
</osis>`;

export const USFX_XML = `<?xml version="1.0" encoding="UTF-8"?>
<usfx>
  <book id="GEN">
    <h>Genesis</h>
    <c id="1"/>
    <p><v id="1"/>In the beginning God created the heavens and the earth.<ve/>
    <v id="2"/>Now the earth was <w>formless</w> and empty.<ve/>
    <v id="3"/>God said, Let there be light.</p>
    <c id="2"/>
    <p><v id="1"/>The heavens and the earth were completed.<ve/></p>
  </book>
  <book id="MAT">
    <c id="5"/>
    <p><v id="1"/>Seeing the multitudes, he went up onto the mountain.<ve/></p>
  </book>
</usfx>`;

export const GENERIC_XML = `<?xml version="1.0" encoding="UTF-8"?>
<bible title="Cornilescu" name="Romanian Cornilescu">
  <book id="GEN" name="Geneza">
    <chapter number="1">
      <verse number="2">Pamantul era pustiu si gol.</verse>
      <verse number="1">La inceput, Dumnezeu a facut cerurile si pamantul.</verse>
      <verse number="3">Dumnezeu a zis: Sa fie lumina!</verse>
    </chapter>
    <chapter number="2">
      <verse number="1">Astfel au fost sfarsite cerurile si pamantul.</verse>
    </chapter>
  </book>
  <book id="TOB" name="Tobit">
    <chapter number="1">
      <verse number="1">Cartea faptelor lui Tobit.</verse>
    </chapter>
  </book>
</bible>`;

export const MALFORMED_XML = `<?xml version="1.0"?>
<osis><osisText><div type="book" osisID="Gen"></osisText>`;

export function parseFixture(xml: string): ParsedDocument {
  const result = ParsedDocument.parse(xml);
  if (!result.ok) {
    throw new Error(`fixture failed to parse: ${result.error}`);
  }
  return result.document;
}
