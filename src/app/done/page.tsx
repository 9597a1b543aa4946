'use client'

import TransferUI from '@/components/transfer/TransferUI'

export default function DonePage() {
  return (
    <section id="transfer" className="relative" style={{ minHeight: '50vh' }}>
      <TransferUI stage="DONE" />
    </section>
  )
}
