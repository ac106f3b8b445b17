import type { NextAuthOptions } from 'next-auth'
import CredentialsProvider from 'next-auth/providers/credentials'
import { db } from './db'
import { checkRateLimit } from './rate-limit'
import { findUserByEmail, verifyPassword } from './users'

export const authOptions: NextAuthOptions = {
  providers: [
    // Email/password credentials
    CredentialsProvider({
      name: 'Email',
      credentials: {
        email: { label: 'Email', type: 'email' },
        password: { label: 'Password', type: 'password' },
      },
      async authorize(credentials) {
        if (!credentials?.email || !credentials?.password) return null

        // Rate limit login attempts by email (10/hour)
        const rateLimited = await checkRateLimit('login', credentials.email.toLowerCase())
        if (rateLimited) {
          console.warn('[auth] Login rate limited for', credentials.email)
          return null
        }

        const user = await findUserByEmail(db, credentials.email)
        if (!user || !user.active) return null

        const valid = await verifyPassword(credentials.password, user.password_hash)
        if (!valid) return null

        return { id: String(user.id), email: user.email, name: user.username }
      },
    }),
  ],
  session: {
    strategy: 'jwt',
  },
  callbacks: {
    async jwt({ token, user }) {
      if (user) {
        token.id = user.id
        token.sub = user.id
      }
      return token
    },
    async session({ session, token }) {
      if (session.user) {
        session.user.id = token.id ?? token.sub ?? ''
      }
      return session
    },
  },
}
