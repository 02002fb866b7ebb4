import {
  IdentifierList,
  LocationList,
  NamespaceList,
  RelatedList,
  SampleList,
  TagList,
} from '../../../components/record/lists';
import { RecordHeader, type DisplayPageProps } from '../../../components/record/RecordHeader';
import { RelationSections, hasAnyRelation } from '../../../components/record/RelationSections';
import { VersionTable } from '../../../components/record/VersionTable';
import { Section } from '../../../components/ui';
import type { DisplayView } from '../../../lib/display';

const RELATED_SCHEMES = ['parent_schemes', 'child_schemes', 'input_to_mappings', 'output_from_mappings'];
const ORGANIZATIONS = ['maintainers', 'funders', 'users'];

export default function SchemePage({ view, viewer, urls }: DisplayPageProps<DisplayView<'m'>>) {
  const { record, relations } = view;

  return (
    <article className="record record-scheme">
      <RecordHeader view={view} viewer={viewer} urls={urls} />

      {view.keywords.length > 0 && (
        <Section id="keywords" header="Subject areas">
          <TagList items={view.keywords} />
        </Section>
      )}

      {view.dataTypes.length > 0 && (
        <Section id="dataTypes" header="Data types">
          <TagList items={view.dataTypes} />
        </Section>
      )}

      {view.hasRelatedSchemes && (
        <Section id="related-schemes" header="Related schemes">
          <RelationSections series="m" relations={relations} names={RELATED_SCHEMES} urls={urls} />
        </Section>
      )}

      {hasAnyRelation(relations, ORGANIZATIONS) && (
        <Section id="organizations" header="Organizations">
          <RelationSections series="m" relations={relations} names={ORGANIZATIONS} urls={urls} />
        </Section>
      )}

      {relations.tools && (
        <Section id="tools" header="Tools">
          <RelatedList records={relations.tools} urls={urls} />
        </Section>
      )}

      {relations.endorsements && (
        <Section id="endorsements" header="Endorsements">
          <RelatedList records={relations.endorsements} urls={urls} />
        </Section>
      )}

      {view.versions.length > 0 && (
        <Section id="versions" header="Versions">
          <VersionTable series="m" docId={view.docId} versions={view.versions} viewer={viewer} urls={urls} />
        </Section>
      )}

      {record.locations && record.locations.length > 0 && (
        <Section id="locations" header="Links">
          <LocationList series="m" locations={record.locations} />
        </Section>
      )}

      {record.namespaces && record.namespaces.length > 0 && (
        <Section id="namespaces" header="Namespaces">
          <NamespaceList namespaces={record.namespaces} />
        </Section>
      )}

      <Section id="identifiers" header="Identifiers">
        <IdentifierList mscid={view.mscid} identifiers={record.identifiers} />
      </Section>

      {record.samples && record.samples.length > 0 && (
        <Section id="samples" header="Sample records">
          <SampleList samples={record.samples} />
        </Section>
      )}
    </article>
  );
}
