'use client'

import { useEffect, useState } from 'react'
import type { Stage } from '@/types'
import { isPlaylistProvider, metadataOf } from '@/lib/providers'
import { collectionOf } from '@/lib/playlists'
import { selectedItems } from '@/lib/transfer'
import { useMigration } from '@/hooks/useMigration'
import ProviderSelectorSection from './ProviderSelectorSection'
import PlaylistSelectorSection from './PlaylistSelectorSection'
import TransferButtonSection from './TransferButtonSection'

interface TransferUIProps {
    stage: Stage
}

export default function TransferUI({ stage }: TransferUIProps) {
    const [isMobile, setIsMobile] = useState(false)
    const { controller, state } = useMigration()

    useEffect(() => {
        const checkMobile = () => {
            setIsMobile(window.innerWidth < 768)
        }

        checkMobile()
        window.addEventListener('resize', checkMobile)

        return () => window.removeEventListener('resize', checkMobile)
    }, [])

    const source = controller.activeSource()
    const destination = controller.activeDestination()
    const canProceed = controller.canProceed()
    const playlists = collectionOf(state.playlists, source)

    const handleLogoutAll = () => {
        controller.logoutAll().catch((error: unknown) => {
            console.error('[auth] Logout failed:', error instanceof Error ? error.message : 'Unknown error')
        })
    }

    if (stage === 'DONE') {
        const batch = state.lastTransfer
        const count = batch?.items.length ?? 0
        const destinationName = metadataOf(batch?.destination ?? destination).name
        const sent = batch !== null && isPlaylistProvider(batch.destination)
        let summary = 'Nothing was selected.'
        if (count > 0) {
            summary = sent
                ? `${count} playlists are on their way to ${destinationName}.`
                : `Nothing was sent: ${destinationName} does not accept transfers.`
        }
        return (
            <div className="w-full flex flex-col items-center justify-center space-y-4 py-16 font-mono">
                <p className="text-xl text-green-400">{sent && count > 0 ? 'Transfer started!' : 'Transfer finished'}</p>
                <p className="text-sm text-green-300">{summary}</p>
                <button
                    onClick={() => controller.home()}
                    className="px-4 py-2 border border-green-400 rounded hover:bg-green-900 transition-colors"
                >
                    Start over
                </button>
            </div>
        )
    }

    return (
        <div className="w-full h-[50vh] flex items-center justify-center">
            <div className="max-w-[95%] w-full h-full">
                <div className={isMobile ? 'flex flex-col space-y-6' : 'grid grid-cols-6 h-full'}>

                    {/* Section 1: Pick and log in to both providers */}
                    <div className={isMobile ? 'w-full' : 'col-span-2'}>
                        <ProviderSelectorSection isMobile={isMobile} />
                        <button
                            onClick={handleLogoutAll}
                            className="mt-2 w-full text-xs text-red-400 hover:text-red-300 transition-colors bg-black bg-opacity-50 py-1 rounded"
                        >
                            Logout everywhere
                        </button>
                    </div>

                    {/* Section 2: Playlists of the active source */}
                    <div className={isMobile ? 'w-full' : 'col-span-3'}>
                        {stage === 'LIST' ? (
                            <PlaylistSelectorSection
                                isMobile={isMobile}
                                sourceName={metadataOf(source).name}
                                playlists={playlists}
                                loading={state.loading}
                                lastError={state.lastError}
                                onToggleAll={active => controller.toggleAll(active)}
                                onToggleOne={(id, active) => controller.toggleOne(id, active)}
                            />
                        ) : (
                            <div className="h-full flex items-center justify-center">
                                <button
                                    onClick={() => controller.proceed()}
                                    disabled={!canProceed}
                                    className={`
                                        px-6 py-3 font-mono border rounded
                                        ${canProceed ? 'border-green-400 hover:bg-green-900' : 'border-gray-600 text-gray-600 cursor-not-allowed'}
                                    `}
                                    title={canProceed ? 'Choose playlists' : 'Log in to both services first'}
                                >
                                    {canProceed ? 'Choose playlists →' : 'Log in to both services first'}
                                </button>
                            </div>
                        )}
                    </div>

                    {/* Section 3: Transfer */}
                    <div className={isMobile ? 'w-full' : 'col-span-1'}>
                        {stage === 'LIST' && (
                            <TransferButtonSection
                                isMobile={isMobile}
                                destination={destination}
                                selectedCount={selectedItems(playlists).length}
                                onTransfer={() => controller.submit()}
                            />
                        )}
                    </div>
                </div>
            </div>
        </div>
    )
}
