export interface SiteSettings {
  siteName: string;
  senderName: string;
  senderEmail: string;
  supportEmail: string | null;
  supportPhone: string | null;
  requireEmailVerification: boolean;
  storageBucket: string;
  storageRegion: string;
}

export interface TestEmailResult {
  success: true;
  message: string;
}
