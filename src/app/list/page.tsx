'use client'

import TransferUI from '@/components/transfer/TransferUI'

export default function ListPage() {
  return (
    <section id="transfer" className="relative" style={{ minHeight: '50vh' }}>
      <TransferUI stage="LIST" />
    </section>
  )
}
