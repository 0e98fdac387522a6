import { PipelineConfig } from '../config/types';
import { MessageDraft, ObjectionTemplateRecord } from '../types/domain';

export type DraftPolicy = Pick<PipelineConfig, 'bookingLink' | 'meeting' | 'maxItemsPerMessage'>;

export interface ObjectionDraft extends MessageDraft {
    templateId: string | null;
}

export function renderTemplate(template: string, variables: Record<string, string>): string {
    return template.replace(/\{([a-z_]+)\}/g, (placeholder: string, key: string) => variables[key] ?? placeholder);
}

/** Risposta standard per un lead interessato: link di prenotazione e finestra disponibile. */
export function buildInterestResponse(companyName: string, policy: DraftPolicy): MessageDraft {
    const title = renderTemplate(policy.meeting.titleTemplate, { company_name: companyName });
    return {
        subject: `Re: ${companyName}`,
        body: [
            'Perfect.',
            '',
            `Grab a quick ${policy.meeting.duration} here:`,
            policy.bookingLink,
            '',
            `${policy.meeting.days}, ${policy.meeting.hours} works best.`,
            '',
            `Title: ${title}`,
        ].join('\n'),
    };
}

/**
 * Solo template approvati: senza template attivo per il tipo si usa la risposta
 * generica. Il link di prenotazione chiude sempre il corpo.
 */
export function buildObjectionResponse(
    template: ObjectionTemplateRecord | undefined,
    companyName: string,
    itemNames: readonly string[],
    policy: DraftPolicy
): ObjectionDraft {
    if (!template) {
        return {
            subject: `Re: ${companyName}`,
            body: [
                'Totally understand.',
                '',
                'Happy to share a few relevant lines that might fit — best way is a quick call so I can understand your needs.',
                '',
                policy.bookingLink,
            ].join('\n'),
            templateId: null,
        };
    }

    const variables = {
        company_name: companyName,
        item_names: itemNames.length > 0 ? itemNames.slice(0, policy.maxItemsPerMessage).join(', ') : 'relevant lines',
        booking_link: policy.bookingLink,
    };
    let body = renderTemplate(template.template_body, variables);
    if (!body.includes(policy.bookingLink)) {
        body = `${body}\n\n${policy.bookingLink}`;
    }
    const subject = renderTemplate(template.template_subject ?? 'Re: {company_name}', variables);
    return { subject, body, templateId: template.objection_type };
}
