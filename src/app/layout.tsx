import type { Metadata } from 'next'
import type { ReactNode } from 'react'
import { Suspense } from 'react'
import { Inter } from 'next/font/google'
import './globals.css'
import Header from '@/components/Header'
import MigrationProvider from '@/components/MigrationProvider'

const inter = Inter({ subsets: ['latin'] })

export const metadata: Metadata = {
  title: 'Replaylist - Move Your Playlists',
  description: 'Copy playlists between Apple Music, Spotify, YouTube Music and Amazon Music',
}

export default function RootLayout({
  children,
}: {
  children: ReactNode
}) {
  return (
    <html lang="en">
      <body className={`${inter.className} bg-black text-green-400 overflow-x-hidden`}>
        <main className="relative">
          <Header />
          {/* useSearchParams needs a suspense boundary */}
          <Suspense fallback={null}>
            <MigrationProvider>
              {children}
            </MigrationProvider>
          </Suspense>
        </main>
      </body>
    </html>
  )
}
