import { CreatorList, IdentifierList, LocationList } from '../../../components/record/lists';
import { RecordHeader, type DisplayPageProps } from '../../../components/record/RecordHeader';
import { RelationSections, hasAnyRelation } from '../../../components/record/RelationSections';
import { VersionTable } from '../../../components/record/VersionTable';
import { Section } from '../../../components/ui';
import type { DisplayView } from '../../../lib/display';

const SCHEMES = ['input_schemes', 'output_schemes'];
const ORGANIZATIONS = ['maintainers', 'funders', 'users'];

export default function MappingPage({ view, viewer, urls }: DisplayPageProps<DisplayView<'c'>>) {
  const { record, relations } = view;

  return (
    <article className="record record-mapping">
      <RecordHeader view={view} viewer={viewer} urls={urls} />

      {record.creators && record.creators.length > 0 && (
        <Section id="creators" header="Creators">
          <CreatorList creators={record.creators} />
        </Section>
      )}

      {hasAnyRelation(relations, SCHEMES) && (
        <Section id="schemes" header="Schemes">
          <RelationSections series="c" relations={relations} names={SCHEMES} urls={urls} />
        </Section>
      )}

      {view.versions.length > 0 && (
        <Section id="versions" header="Versions">
          <VersionTable series="c" docId={view.docId} versions={view.versions} viewer={viewer} urls={urls} />
        </Section>
      )}

      {hasAnyRelation(relations, ORGANIZATIONS) && (
        <Section id="organizations" header="Organizations">
          <RelationSections series="c" relations={relations} names={ORGANIZATIONS} urls={urls} />
        </Section>
      )}

      {record.locations && record.locations.length > 0 && (
        <Section id="locations" header="Links">
          <LocationList series="c" locations={record.locations} />
        </Section>
      )}

      <Section id="identifiers" header="Identifiers">
        <IdentifierList mscid={view.mscid} identifiers={record.identifiers} />
      </Section>
    </article>
  );
}
