import { CreatorList, IdentifierList, LocationList, RelatedList } from '../../../components/record/lists';
import { RecordHeader, type DisplayPageProps } from '../../../components/record/RecordHeader';
import { Section } from '../../../components/ui';
import { validityPeriod, type DisplayView } from '../../../lib/display';

export default function EndorsementPage({ view, viewer, urls }: DisplayPageProps<DisplayView<'e'>>) {
  const { record, relations } = view;
  const validity = validityPeriod(record.valid_from, record.valid_to);

  return (
    <article className="record record-endorsement">
      <RecordHeader view={view} viewer={viewer} urls={urls} />

      {record.creators && record.creators.length > 0 && (
        <Section id="creators" header="Authors">
          <CreatorList creators={record.creators} />
        </Section>
      )}

      {record.publication && (
        <Section id="publication" header="Citation">
          <p className="citation">{record.publication}</p>
        </Section>
      )}

      {(record.issued || validity) && (
        <Section id="dates" header="Dates">
          <dl className="date-list">
            {record.issued && (
              <>
                <dt>Issued</dt>
                <dd>{record.issued}</dd>
              </>
            )}
            {validity && (
              <>
                <dt>Validity</dt>
                <dd className="validity">{validity}</dd>
              </>
            )}
          </dl>
        </Section>
      )}

      {relations.endorsed_schemes && (
        <Section id="endorsed_schemes" header="Endorsed schemes">
          <RelatedList records={relations.endorsed_schemes} urls={urls} />
        </Section>
      )}

      {relations.originators && (
        <Section id="originators" header="Endorsed by">
          <RelatedList records={relations.originators} urls={urls} />
        </Section>
      )}

      {record.locations && record.locations.length > 0 && (
        <Section id="locations" header="Endorsement document">
          <LocationList series="e" locations={record.locations} />
        </Section>
      )}

      <Section id="identifiers" header="Identifiers">
        <IdentifierList mscid={view.mscid} identifiers={record.identifiers} />
      </Section>
    </article>
  );
}
