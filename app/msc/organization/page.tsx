import { IdentifierList, LocationList, RelatedList, TagList } from '../../../components/record/lists';
import { RecordHeader, type DisplayPageProps } from '../../../components/record/RecordHeader';
import { RelationSections, hasAnyRelation } from '../../../components/record/RelationSections';
import { Section } from '../../../components/ui';
import type { DisplayView } from '../../../lib/display';

const GROUPS: ReadonlyArray<{ id: string; header: string; names: string[] }> = [
  { id: 'schemes', header: 'Schemes', names: ['maintained_schemes', 'funded_schemes', 'used_schemes'] },
  { id: 'tools', header: 'Tools', names: ['maintained_tools', 'funded_tools', 'used_tools'] },
  { id: 'mappings', header: 'Mappings', names: ['maintained_mappings', 'funded_mappings', 'used_mappings'] },
];

export default function OrganizationPage({ view, viewer, urls }: DisplayPageProps<DisplayView<'g'>>) {
  const { record, relations } = view;

  return (
    <article className="record record-organization">
      <RecordHeader view={view} viewer={viewer} urls={urls} />

      {record.types && record.types.length > 0 && (
        <Section id="types" header="Type of organization">
          <TagList items={record.types} />
        </Section>
      )}

      {record.locations && record.locations.length > 0 && (
        <Section id="locations" header="Websites and contact addresses">
          <LocationList series="g" locations={record.locations} />
        </Section>
      )}

      {GROUPS.filter((group) => hasAnyRelation(relations, group.names)).map((group) => (
        <Section key={group.id} id={group.id} header={group.header}>
          <RelationSections series="g" relations={relations} names={group.names} urls={urls} />
        </Section>
      ))}

      {relations.endorsements && (
        <Section id="endorsements" header="Endorsements">
          <RelatedList records={relations.endorsements} urls={urls} />
        </Section>
      )}

      <Section id="identifiers" header="Identifiers">
        <IdentifierList mscid={view.mscid} identifiers={record.identifiers} />
      </Section>
    </article>
  );
}
