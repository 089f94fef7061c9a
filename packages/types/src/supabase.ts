export type Json =
  | string
  | number
  | boolean
  | null
  | { [key: string]: Json | undefined }
  | Json[];

type JobColumns = {
  job_id: string;
  stop_number: string;
  status: string;
  state: string;
  carrier: string;
  market: string;
  city: string;
  customer_name: string;
  delivery_address: string;
  client_order_number: string;
  prior_job_id: string;
  product_description: string;
  product_serial: string;
  assigned_driver: string;
  is_routed: boolean;
  confirmation_status: string;
  notification_detail: string;
  signed_by: string;
  driver_notes: string;
  job_type: string;
  white_glove: boolean;
  piece_count: number;
  product_weight_lbs: number;
  crew_required: number;
  miles_oneway: number;
  planned_date: string | null;
  actual_date: string | null;
  arrival_time: string | null;
  date_received: string | null;
  job_created_at: string | null;
  delay_days: number | null;
  dwell_minutes: number | null;
  lead_time_days: number | null;
  scan_events: Json;
  scan_count: number;
  last_scan_user: string;
  last_scan_time: string | null;
  delivery_scan_count: number;
};

export type Database = {
  public: {
    Tables: {
      active_jobs: {
        Row: JobColumns & {
          id: string;
          snapshot_date: string;
          created_at: string;
        };
        Insert: JobColumns & {
          id?: string;
          snapshot_date: string;
          created_at?: string;
        };
        Update: Partial<JobColumns> & {
          id?: string;
          snapshot_date?: string;
          created_at?: string;
        };
        Relationships: [];
      };
      job_archive: {
        Row: JobColumns & {
          id: string;
          completed_at: string;
        };
        Insert: JobColumns & {
          id?: string;
          completed_at?: string;
        };
        Update: Partial<JobColumns> & {
          id?: string;
          completed_at?: string;
        };
        Relationships: [];
      };
      kpi_snapshots: {
        Row: {
          id: string;
          report_date: string;
          total_jobs: number;
          arrived_count: number;
          on_time_pct: number;
          avg_delay_days: number;
          overdue_count: number;
          ready_for_routing: number;
          avg_scans_per_job: number;
          jobs_with_scans: number;
          created_at: string;
        };
        Insert: {
          id?: string;
          report_date: string;
          total_jobs: number;
          arrived_count: number;
          on_time_pct: number;
          avg_delay_days: number;
          overdue_count: number;
          ready_for_routing: number;
          avg_scans_per_job: number;
          jobs_with_scans: number;
          created_at?: string;
        };
        Update: {
          id?: string;
          report_date?: string;
          total_jobs?: number;
          arrived_count?: number;
          on_time_pct?: number;
          avg_delay_days?: number;
          overdue_count?: number;
          ready_for_routing?: number;
          avg_scans_per_job?: number;
          jobs_with_scans?: number;
          created_at?: string;
        };
        Relationships: [];
      };
      carrier_kpis: {
        Row: {
          id: string;
          report_date: string;
          carrier: string;
          total_jobs: number;
          on_time_pct: number;
          avg_delay_days: number;
          overdue_count: number;
          ready_for_routing: number;
          avg_dwell_minutes: number | null;
          avg_lead_time_days: number | null;
          created_at: string;
        };
        Insert: {
          id?: string;
          report_date: string;
          carrier: string;
          total_jobs: number;
          on_time_pct: number;
          avg_delay_days: number;
          overdue_count: number;
          ready_for_routing: number;
          avg_dwell_minutes?: number | null;
          avg_lead_time_days?: number | null;
          created_at?: string;
        };
        Update: {
          id?: string;
          report_date?: string;
          carrier?: string;
          total_jobs?: number;
          on_time_pct?: number;
          avg_delay_days?: number;
          overdue_count?: number;
          ready_for_routing?: number;
          avg_dwell_minutes?: number | null;
          avg_lead_time_days?: number | null;
          created_at?: string;
        };
        Relationships: [];
      };
      chains: {
        Row: {
          chain_id: string;
          product_serial: string;
          carrier: string | null;
          total_jobs: number;
          reschedule_count: number;
          first_planned_date: string | null;
          final_planned_date: string | null;
          total_delay_days: number;
          current_status: string | null;
          current_job_id: string | null;
          created_at: string;
          updated_at: string;
        };
        Insert: {
          chain_id?: string;
          product_serial: string;
          carrier?: string | null;
          total_jobs?: number;
          reschedule_count?: number;
          first_planned_date?: string | null;
          final_planned_date?: string | null;
          total_delay_days?: number;
          current_status?: string | null;
          current_job_id?: string | null;
          created_at?: string;
          updated_at?: string;
        };
        Update: {
          chain_id?: string;
          product_serial?: string;
          carrier?: string | null;
          total_jobs?: number;
          reschedule_count?: number;
          first_planned_date?: string | null;
          final_planned_date?: string | null;
          total_delay_days?: number;
          current_status?: string | null;
          current_job_id?: string | null;
          created_at?: string;
          updated_at?: string;
        };
        Relationships: [];
      };
      chain_members: {
        Row: {
          id: string;
          chain_id: string;
          job_id: string;
          sequence_order: number;
          status: string | null;
          planned_date: string | null;
          actual_date: string | null;
          delay_days: number | null;
          reschedule_reason: string | null;
          linked_at: string;
        };
        Insert: {
          id?: string;
          chain_id: string;
          job_id: string;
          sequence_order: number;
          status?: string | null;
          planned_date?: string | null;
          actual_date?: string | null;
          delay_days?: number | null;
          reschedule_reason?: string | null;
          linked_at?: string;
        };
        Update: {
          id?: string;
          chain_id?: string;
          job_id?: string;
          sequence_order?: number;
          status?: string | null;
          planned_date?: string | null;
          actual_date?: string | null;
          delay_days?: number | null;
          reschedule_reason?: string | null;
          linked_at?: string;
        };
        Relationships: [
          {
            foreignKeyName: "chain_members_chain_id_fkey";
            columns: ["chain_id"];
            isOneToOne: false;
            referencedRelation: "chains";
            referencedColumns: ["chain_id"];
          }
        ];
      };
      stage_transitions: {
        Row: {
          id: string;
          job_id: string;
          from_status: string | null;
          to_status: string;
          transitioned_at: string;
        };
        Insert: {
          id?: string;
          job_id: string;
          from_status?: string | null;
          to_status: string;
          transitioned_at?: string;
        };
        Update: {
          id?: string;
          job_id?: string;
          from_status?: string | null;
          to_status?: string;
          transitioned_at?: string;
        };
        Relationships: [];
      };
    };
    Views: {
      [_ in never]: never;
    };
    Functions: {
      [_ in never]: never;
    };
    Enums: {
      [_ in never]: never;
    };
    CompositeTypes: {
      [_ in never]: never;
    };
  };
};

export type Tables<T extends keyof Database["public"]["Tables"]> = Database["public"]["Tables"][T]["Row"];
export type TablesInsert<T extends keyof Database["public"]["Tables"]> = Database["public"]["Tables"][T]["Insert"];
export type TablesUpdate<T extends keyof Database["public"]["Tables"]> = Database["public"]["Tables"][T]["Update"];
