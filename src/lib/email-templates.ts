import { getConfig } from './config'
import { sanitizeText as esc } from './moderation'

export const APP_NAME = 'Ciutat Activa'

export type EmailTemplate = { subject: string; html: string }

const baseUrl = () => getConfig().appUrl

const layout = (content: string) => `
<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
</head>
<body style="margin:0;padding:0;background:#f4f6f5;font-family:-apple-system,BlinkMacSystemFont,'Segoe UI',Roboto,sans-serif;">
  <div style="max-width:560px;margin:0 auto;padding:32px 16px;">
    <!-- Header -->
    <div style="text-align:center;padding:24px 0 20px;">
      <a href="${baseUrl()}" style="text-decoration:none;font-size:22px;font-weight:700;color:#1f7a4d;">${APP_NAME}</a>
    </div>
    <!-- Content -->
    <div style="background:#ffffff;border-radius:12px;padding:32px;border:1px solid #dfe5e2;">
      ${content}
    </div>
    <!-- Footer -->
    <div style="text-align:center;padding:24px 0 8px;">
      <p style="color:#6b7280;font-size:12px;margin:0;">
        ${APP_NAME} &middot; <a href="${baseUrl()}" style="color:#1f7a4d;text-decoration:none;">${baseUrl()}</a>
      </p>
    </div>
  </div>
</body>
</html>
`

const button = (href: string, label: string) =>
  `<a href="${href}" style="display:inline-block;background:#1f7a4d;color:#fff;text-decoration:none;padding:14px 28px;border-radius:8px;font-weight:600;font-size:15px;margin:16px 0;">${label}</a>`

const heading = (text: string) =>
  `<h2 style="margin:0 0 8px;color:#111827;font-size:20px;">${text}</h2>`

const paragraph = (text: string) =>
  `<p style="color:#4b5563;font-size:14px;margin:0 0 16px;">${text}</p>`

const quote = (text: string) =>
  `<div style="background:#f0f7f3;border-left:3px solid #1f7a4d;padding:12px 16px;margin:16px 0;border-radius:0 6px 6px 0;">
    <p style="margin:0;color:#1f2937;font-size:14px;white-space:pre-line;">${text}</p>
  </div>`

export function formatAmount(cents: number, currency = 'eur'): string {
  return `${(cents / 100).toFixed(2)} ${currency.toUpperCase()}`
}

export function welcomeEmail(params: { username: string }): EmailTemplate {
  return {
    subject: `Benvingut/da a ${APP_NAME}`,
    html: layout(`
      ${heading(`Hola ${esc(params.username)}!`)}
      ${paragraph('Gràcies per unir-te. Ara pots reportar incidències al mapa, crear iniciatives i participar-hi.')}
      <div style="text-align:center;">
        ${button(`${baseUrl()}/inventory`, 'Obrir el mapa')}
      </div>
    `),
  }
}

export function donationConfirmationEmail(params: { amountCents: number; currency: string }): EmailTemplate {
  const amount = formatAmount(params.amountCents, params.currency)
  return {
    subject: `Gràcies per la teva donació de ${amount}`,
    html: layout(`
      ${heading('Gràcies pel teu suport')}
      ${paragraph(`Hem rebut la teva donació de <strong>${amount}</strong>. Ens ajuda a mantenir el projecte en marxa.`)}
    `),
  }
}

export function initiativeApprovedEmail(params: { title: string; slug: string }): EmailTemplate {
  return {
    subject: `La teva iniciativa ha estat aprovada: ${params.title}`,
    html: layout(`
      ${heading('Iniciativa aprovada')}
      ${paragraph(`La iniciativa <strong>${esc(params.title)}</strong> ja és pública.`)}
      <div style="text-align:center;">
        ${button(`${baseUrl()}/initiatives/${encodeURIComponent(params.slug)}`, 'Veure la iniciativa')}
      </div>
    `),
  }
}

export function initiativeRejectedEmail(params: { title: string; reason?: string | null }): EmailTemplate {
  return {
    subject: `La teva iniciativa no ha estat aprovada: ${params.title}`,
    html: layout(`
      ${heading('Iniciativa no aprovada')}
      ${paragraph(`Hem revisat <strong>${esc(params.title)}</strong> i ara mateix no la podem publicar.`)}
      ${params.reason ? quote(esc(params.reason)) : ''}
      ${paragraph('Pots crear-ne una de nova tenint en compte aquests comentaris.')}
    `),
  }
}

type InitiativeEventParams = {
  title: string
  slug: string
  date: string
  time?: string | null
  location: string
}

const eventDetails = (p: InitiativeEventParams) =>
  quote(`${esc(p.date)}${p.time ? ` · ${esc(p.time)}` : ''}\n${esc(p.location)}`)

export function initiativeReminderEmail(params: InitiativeEventParams): EmailTemplate {
  return {
    subject: `Recordatori: ${params.title}`,
    html: layout(`
      ${heading('Ens veiem aviat')}
      ${paragraph(`Et recordem que <strong>${esc(params.title)}</strong> és a punt de començar.`)}
      ${eventDetails(params)}
      <div style="text-align:center;">
        ${button(`${baseUrl()}/initiatives/${encodeURIComponent(params.slug)}`, 'Veure detalls')}
      </div>
    `),
  }
}

export function participantConfirmationEmail(params: InitiativeEventParams): EmailTemplate {
  return {
    subject: `T'has apuntat a: ${params.title}`,
    html: layout(`
      ${heading('Inscripció confirmada')}
      ${paragraph(`Gràcies per apuntar-te a <strong>${esc(params.title)}</strong>.`)}
      ${eventDetails(params)}
      <div style="text-align:center;">
        ${button(`${baseUrl()}/initiatives/${encodeURIComponent(params.slug)}`, 'Veure la iniciativa')}
      </div>
    `),
  }
}

export function inventoryApprovedEmail(params: { itemId: number; categoryName: string }): EmailTemplate {
  return {
    subject: 'El teu report ja és al mapa',
    html: layout(`
      ${heading('Report aprovat')}
      ${paragraph(`El teu report de <strong>${esc(params.categoryName)}</strong> ja és visible al mapa.`)}
      <div style="text-align:center;">
        ${button(`${baseUrl()}/inventory/${params.itemId}`, 'Veure al mapa')}
      </div>
    `),
  }
}

export function inventoryRejectedEmail(params: {
  itemId: number
  categoryName: string
  reason?: string | null
}): EmailTemplate {
  return {
    subject: 'El teu report no ha estat aprovat',
    html: layout(`
      ${heading('Report no aprovat')}
      ${paragraph(`Hem revisat el teu report de <strong>${esc(params.categoryName)}</strong> (#${params.itemId}) i no el publicarem.`)}
      ${params.reason ? quote(esc(params.reason)) : ''}
    `),
  }
}

export function contactConfirmationEmail(params: { name: string; message: string }): EmailTemplate {
  return {
    subject: 'Hem rebut el teu missatge',
    html: layout(`
      ${heading(`Gràcies, ${esc(params.name)}`)}
      ${paragraph('Hem rebut el teu missatge i et respondrem tan aviat com puguem.')}
      ${quote(esc(params.message))}
    `),
  }
}

export function adminNotificationEmail(params: {
  title: string
  fields: Record<string, string | number | null | undefined>
  link?: string
}): EmailTemplate {
  const rows = Object.entries(params.fields)
    .filter(([, value]) => value !== null && value !== undefined && value !== '')
    .map(([key, value]) =>
      `<tr><td style="padding:4px 12px 4px 0;color:#6b7280;font-size:13px;">${esc(key)}</td>` +
      `<td style="padding:4px 0;color:#111827;font-size:13px;white-space:pre-line;">${esc(String(value))}</td></tr>`
    )
    .join('')

  return {
    subject: `[Admin] ${params.title}`,
    html: layout(`
      ${heading(esc(params.title))}
      <table style="border-collapse:collapse;margin:8px 0 16px;">${rows}</table>
      ${params.link ? `<div style="text-align:center;">${button(params.link, 'Revisar')}</div>` : ''}
    `),
  }
}

export function passwordResetEmail(params: { token: string }): EmailTemplate {
  const resetUrl = `${baseUrl()}/auth/reset-password?token=${encodeURIComponent(params.token)}`

  return {
    subject: `Restableix la contrasenya de ${APP_NAME}`,
    html: layout(`
      ${heading('Restableix la contrasenya')}
      ${paragraph("Fes clic al botó per triar una contrasenya nova.")}
      <div style="text-align:center;">
        ${button(resetUrl, 'Restablir contrasenya')}
      </div>
      <p style="color:#9ca3af;font-size:12px;margin-top:16px;">
        L'enllaç caduca en 1 hora. Si no ho has demanat tu, ignora aquest correu.
      </p>
    `),
  }
}
