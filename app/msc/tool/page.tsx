import { CreatorList, IdentifierList, LocationList, RelatedList, TagList } from '../../../components/record/lists';
import { RecordHeader, type DisplayPageProps } from '../../../components/record/RecordHeader';
import { RelationSections, hasAnyRelation } from '../../../components/record/RelationSections';
import { VersionTable } from '../../../components/record/VersionTable';
import { Section } from '../../../components/ui';
import type { DisplayView } from '../../../lib/display';

const ORGANIZATIONS = ['maintainers', 'funders', 'users'];

export default function ToolPage({ view, viewer, urls }: DisplayPageProps<DisplayView<'t'>>) {
  const { record, relations } = view;

  return (
    <article className="record record-tool">
      <RecordHeader view={view} viewer={viewer} urls={urls} />

      {record.types && record.types.length > 0 && (
        <Section id="types" header="Type of tool">
          <TagList items={record.types} />
        </Section>
      )}

      {record.creators && record.creators.length > 0 && (
        <Section id="creators" header="Creators">
          <CreatorList creators={record.creators} />
        </Section>
      )}

      {relations.supported_schemes && (
        <Section id="supported_schemes" header="Supported schemes">
          <RelatedList records={relations.supported_schemes} urls={urls} />
        </Section>
      )}

      {hasAnyRelation(relations, ORGANIZATIONS) && (
        <Section id="organizations" header="Organizations">
          <RelationSections series="t" relations={relations} names={ORGANIZATIONS} urls={urls} />
        </Section>
      )}

      {view.versions.length > 0 && (
        <Section id="versions" header="Versions">
          <VersionTable series="t" docId={view.docId} versions={view.versions} viewer={viewer} urls={urls} />
        </Section>
      )}

      {record.locations && record.locations.length > 0 && (
        <Section id="locations" header="Links">
          <LocationList series="t" locations={record.locations} />
        </Section>
      )}

      <Section id="identifiers" header="Identifiers">
        <IdentifierList mscid={view.mscid} identifiers={record.identifiers} />
      </Section>
    </article>
  );
}
