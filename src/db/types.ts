/**
 * Lead store records
 */

export interface DemoRequestRecord {
  id: number;
  first_name: string;
  last_name: string;
  email: string;
  phone: string | null;
  company: string;
  job_title: string | null;
  industry: string;
  company_size: string | null;
  interests: string[];
  message: string | null;
  submitted_at: string;
  sales_notified: boolean;
  prospect_notified: boolean;
  created_at: Date;
}

export type NewDemoRequest = Omit<DemoRequestRecord, 'id' | 'sales_notified' | 'prospect_notified' | 'created_at'>;

export interface NewsletterSubscriber {
  id: number;
  email: string;
  source: string;
  subscribed_at: string;
}

export interface SubscribeResult {
  subscriber: NewsletterSubscriber;
  /** false when the address was already subscribed */
  created: boolean;
}

export interface NotificationFlags {
  sales: boolean;
  prospect: boolean;
}

export interface DemoRequestStore {
  create(request: NewDemoRequest): Promise<DemoRequestRecord>;
  markNotified(id: number, flags: NotificationFlags): Promise<void>;
}

export interface NewsletterStore {
  subscribe(email: string, source: string, subscribedAt: string): Promise<SubscribeResult>;
}
