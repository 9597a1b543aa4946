import type { Provider } from '@/types'
import { isPlaylistProvider, metadataOf } from '@/lib/providers'

interface TransferButtonSectionProps {
    isMobile: boolean
    destination: Provider
    selectedCount: number
    onTransfer: () => void
}

export default function TransferButtonSection({
    isMobile,
    destination,
    selectedCount,
    onTransfer
}: TransferButtonSectionProps) {
    const destinationName = metadataOf(destination).name
    const acceptsTransfers = isPlaylistProvider(destination)
    const transferReady = acceptsTransfers && selectedCount > 0
    const hint = !acceptsTransfers
        ? `${destinationName} does not accept transfers`
        : 'Select playlists to transfer'

    return (
        <div
            className={`
                relative bg-cover bg-center bg-no-repeat
                flex flex-col items-center justify-center
                ${isMobile ? 'h-[150px]' : 'h-[100%]'}
            `}
            style={{
                backgroundImage: "url('/Buttons/UI_Background.png')",
                backgroundSize: '100% 100%'
            }}
        >
            <img
                src={transferReady ? '/Buttons/Transfer.png' : '/Buttons/Transfer_Disabled.png'}
                alt="Transfer"
                onClick={() => {
                    if (transferReady) onTransfer()
                }}
                className={`
                    ${isMobile ? 'w-[80%] h-auto' : 'w-[90%] h-auto'}
                    ${transferReady ? 'cursor-pointer hover:opacity-80 hover:scale-105 transition-all' : 'cursor-not-allowed'}
                `}
                title={transferReady ? `Transfer ${selectedCount} playlists to ${destinationName}` : hint}
            />

            <p className={`text-xs font-mono mt-2 ${transferReady ? 'text-green-400' : 'text-yellow-400'}`}>
                {transferReady
                    ? `Ready: ${selectedCount} playlists → ${destinationName}`
                    : hint}
            </p>
        </div>
    )
}
