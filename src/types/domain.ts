export type LeadStatus =
    | 'new'
    | 'researched'
    | 'qualified'
    | 'disqualified'
    | 'contacted'
    | 'interested'
    | 'objection'
    | 'booked'
    | 'dead';

export type LeadOutcome = 'not_fit' | 'follow_up' | 'deal_in_progress' | 'closed';

export type DisqualifyReason = 'private_label_only' | 'arbitrage_no_scale';

export type PriceTier = 'budget' | 'mid' | 'premium' | 'luxury' | 'mixed';

export type JobType = 'lead_research';
export type JobStatus = 'queued' | 'running' | 'succeeded' | 'failed';

export type OutboundMessageStatus = 'queued' | 'rendered' | 'sent' | 'delivered' | 'bounced' | 'paused' | 'failed';
export type OutboundMessageType = 'sequence' | 'reply';

export type ReplyClassification = 'interested' | 'objection' | 'not_interested' | 'unsubscribe' | 'out_of_office' | 'unknown';
export type ReplyAction = 'send_calendar' | 'send_curated_catalog' | 'suppress' | 'handoff_to_human';
export type ApprovalState = 'pending' | 'approved' | 'rejected';

export type LintLocation = 'subject' | 'body';

export type AuditEventName =
    | 'lead_created'
    | 'lead_enriched'
    | 'lead_suppressed'
    | 'lead_classified'
    | 'lead_qualified'
    | 'lead_disqualified'
    | 'leverage_assigned'
    | 'item_matched'
    | 'scrape_requested'
    | 'scrape_completed'
    | 'scrape_failed'
    | 'email_rendered'
    | 'email_sent'
    | 'email_delivered'
    | 'email_bounced'
    | 'reply_received'
    | 'reply_classified'
    | 'reply_response_sent'
    | 'suppression_added'
    | 'job_created'
    | 'job_started'
    | 'job_completed'
    | 'job_failed';

export type AuditActor = 'api' | 'cli' | 'worker' | 'webhook' | 'system' | 'operator';

// ─── Record persistiti ────────────────────────────────────────────────────────

export interface LeadRecord {
    id: string;
    company_name: string;
    website: string | null;
    contact_email: string | null;
    channel: string | null;
    niche: string | null;
    location: string | null;
    notes: string | null;
    status: LeadStatus;
    disqualify_reason: string | null;
    outcome: LeadOutcome | null;
    outcome_notes: string | null;
    booked_at: string | null;
    created_at: string;
    updated_at: string;
}

export interface SignalSetRecord {
    id: string;
    lead_id: string;
    platform: string | null;
    site_excerpt: string | null;
    categories_json: string;
    sample_items_json: string;
    brand_mentions_json: string;
    sku_estimate: number | null;
    price_min: number | null;
    price_max: number | null;
    policy_text_found: number;
    policy_text_excerpt: string | null;
    private_label_ratio: number | null;
    brand_list_json: string;
    price_tier: PriceTier | null;
    scale_score: number | null;
    map_behavior_score: number | null;
    store_count: number | null;
    classified_at: string | null;
    artifact_path: string | null;
    artifact_hash: string | null;
    created_at: string;
    updated_at: string;
}

export interface QualificationRecord {
    lead_id: string;
    qualifies: number;
    disqualify_reason: string | null;
    call_id: string | null;
    schema_version: string;
    updated_at: string;
}

export interface LeverageRuleRecord {
    id: string;
    priority: number;
    is_active: number;
    channel_match: string | null;
    min_scale_score: number | null;
    max_private_label_ratio: number | null;
    min_map_behavior_score: number | null;
    min_store_count: number | null;
    requires_brand_overlap: number;
    requires_adjacent_brands: number;
    primary_angle: string;
    secondary_angle: string | null;
    selection_query_json: string;
    description: string | null;
    created_at: string;
}

export interface LeverageAssignmentRecord {
    lead_id: string;
    matched_rule_id: string | null;
    primary_angle: string;
    secondary_angle: string | null;
    match_reason: string;
    selection_query_json: string;
    selected_item_ids_json: string;
    updated_at: string;
}

export interface CatalogItemRecord {
    id: string;
    name: string;
    categories_json: string;
    discount_pct: number;
    minimum_order_value: number | null;
    lead_time_min_days: number | null;
    lead_time_max_days: number | null;
    origin: string | null;
    channel_fit_json: string;
    replenishable: number;
    priority: number;
    catalog_url: string | null;
    notes: string | null;
    active: number;
    created_at: string;
}

export interface OutboundMessageRecord {
    id: string;
    lead_id: string;
    sequence_id: string;
    touch_index: number;
    message_type: OutboundMessageType;
    subject: string;
    body: string;
    status: OutboundMessageStatus;
    scheduled_at: string;
    sent_at: string | null;
    error: string | null;
    lint_violations_json: string;
    provider: string | null;
    provider_campaign_id: string | null;
    provider_lead_id: string | null;
    provider_message_id: string | null;
    reply_id: string | null;
    created_at: string;
    updated_at: string;
}

export interface ReplyRecord {
    id: string;
    lead_id: string;
    outbound_message_id: string | null;
    raw_text: string;
    provider_message_id: string | null;
    classification: ReplyClassification | null;
    objection_type: string | null;
    action: ReplyAction | null;
    interest_level: number | null;
    draft_subject: string | null;
    draft_response: string | null;
    approval: ApprovalState | null;
    lint_violations_json: string;
    response_sent: number;
    call_id: string | null;
    created_at: string;
    updated_at: string;
}

export interface SuppressionEntryRecord {
    id: string;
    email: string | null;
    domain: string | null;
    reason: string;
    source_lead_id: string | null;
    created_at: string;
}

export interface AuditEntryRecord {
    id: number;
    correlation_id: string;
    event: AuditEventName;
    lead_id: string | null;
    job_id: string | null;
    actor: AuditActor;
    payload_json: string;
    created_at: string;
}

export interface JobRecord {
    id: string;
    type: JobType;
    lead_id: string;
    status: JobStatus;
    attempts: number;
    locked_by: string | null;
    locked_at: string | null;
    started_at: string | null;
    completed_at: string | null;
    last_error: string | null;
    created_at: string;
    updated_at: string;
}

export interface ObjectionTemplateRecord {
    objection_type: string;
    pattern_keywords_json: string;
    template_subject: string | null;
    template_body: string;
    is_active: number;
    version: number;
}

// ─── Valori di dominio (non persistiti direttamente) ─────────────────────────

export interface ItemSelectionQuery {
    priorityFirst: boolean;
    cap: number;
    categories?: string[];
}

export interface LintViolation {
    phrase: string;
    location: LintLocation;
}

export interface LintResult {
    ok: boolean;
    violations: LintViolation[];
    itemCapViolation: boolean;
}

export interface VariableLintResult {
    ok: boolean;
    reasons: string[];
}

export interface MessageDraft {
    subject: string;
    body: string;
}
