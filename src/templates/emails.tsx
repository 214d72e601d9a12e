import {
  Body,
  Button,
  Container,
  Head,
  Heading,
  Hr,
  Html,
  Link,
  Preview,
  Section,
  Tailwind,
  Text,
} from "@react-email/components";
import { render } from "@react-email/render";
import type { ReactNode } from "react";

export interface EmailTemplateProps {
  readonly children: ReactNode;
  readonly previewText: string;
  readonly pageTitle?: string;
}

const COMPANY_NAME = process.env.APP_NAME || "Car Rental";
const SUPPORT_EMAIL = process.env.SUPPORT_EMAIL || "";
const CURRENT_YEAR = new Date().getFullYear();

export function EmailTemplate({ children, previewText, pageTitle }: EmailTemplateProps) {
  const effectivePageTitle = pageTitle || previewText;

  return (
    <Tailwind>
      <Html lang="en">
        <Head>
          <title>{effectivePageTitle}</title>
          <Preview>{previewText}</Preview>
        </Head>
        <Body className="bg-gray-100 text-gray-800 font-sans text-base leading-relaxed">
          <Container className="bg-white border border-gray-200 rounded-md mx-auto my-8 p-6 max-w-xl">
            <Section className="bg-indigo-600 rounded-t-md p-4 text-center">
              <Heading as="h1" className="text-white text-2xl m-0">
                {COMPANY_NAME}
              </Heading>
            </Section>

            <Section className="pt-4">{children}</Section>

            <Hr className="my-6 border-gray-300" />
            <Section className="text-center text-xs text-gray-500">
              <Text className="mb-1">
                &copy; {CURRENT_YEAR} {COMPANY_NAME}. All rights reserved.
              </Text>
              {SUPPORT_EMAIL && (
                <Text>
                  Need help? Contact{" "}
                  <Link href={`mailto:${SUPPORT_EMAIL}`} className="text-indigo-600">
                    {SUPPORT_EMAIL}
                  </Link>
                </Text>
              )}
            </Section>
          </Container>
        </Body>
      </Html>
    </Tailwind>
  );
}

interface ActionLinkProps {
  readonly url: string;
  readonly label: string;
}

function ActionLink({ url, label }: ActionLinkProps) {
  return (
    <>
      <Section className="text-center my-6">
        <Button href={url} className="bg-indigo-600 text-white rounded-md px-6 py-3 font-semibold">
          {label}
        </Button>
      </Section>
      <Text className="mb-1">
        If the button doesn't work, copy and paste the following link into your browser:
      </Text>
      <Text className="text-indigo-600 break-all mb-3">{url}</Text>
    </>
  );
}

export async function renderEmailVerificationEmail({ url }: { url: string }) {
  return await render(
    <EmailTemplate previewText="Confirm your email address" pageTitle="Confirm Your Email">
      <Heading as="h2" className="text-xl font-semibold mb-4">
        Welcome to {COMPANY_NAME}
      </Heading>
      <Text className="mb-3">
        Thank you for registering! Please click the button below to confirm your email address.
      </Text>
      <ActionLink url={url} label="Confirm Email" />
      <Text className="mb-3">This link will be valid for 24 hours.</Text>
      <Text className="mb-3">If you didn't register this account, please ignore this email.</Text>
    </EmailTemplate>,
  );
}

export async function renderPasswordResetEmail({ url }: { url: string }) {
  return await render(
    <EmailTemplate previewText="Reset your password" pageTitle="Password Reset Request">
      <Heading as="h2" className="text-xl font-semibold mb-4">
        Password Reset Request
      </Heading>
      <Text className="mb-3">
        We received a request to reset your password. Please click the button below to choose a new
        one.
      </Text>
      <ActionLink url={url} label="Reset Password" />
      <Section className="bg-yellow-50 border-l-4 border-yellow-400 px-3 my-4">
        <Text>
          <span className="font-semibold">Note:</span> If you didn't request a password reset,
          please ignore this email. Your password will not be changed.
        </Text>
      </Section>
      <Text className="mb-3">This link will be valid for 1 hour.</Text>
    </EmailTemplate>,
  );
}

export interface TestEmailProps {
  readonly recipient: string;
  readonly sentAt: string;
}

export async function renderTestEmail({ recipient, sentAt }: TestEmailProps) {
  return await render(
    <EmailTemplate previewText="Email configuration test" pageTitle="Test Email">
      <Heading as="h2" className="text-xl font-semibold mb-4">
        Email Configuration Test
      </Heading>
      <Text className="mb-3">
        This is a test email sent to {recipient} to confirm that outgoing mail is configured
        correctly.
      </Text>
      <Text className="mb-3 text-gray-500">Sent at {sentAt}.</Text>
    </EmailTemplate>,
  );
}
